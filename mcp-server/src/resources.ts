/**
 * Reference documents and example programs served as MCP resources.
 */

import * as fs from "fs";
import * as path from "path";

export interface ExampleProgram {
  name: string;
  filename: string;
}

/**
 * Locate a directory shipped beside this package. Sources sit in
 * `mcp-server/src`, compiled output in `dist/mcp-server/src`.
 */
export function packageDir(name: string): string {
  const candidates = [
    path.resolve(__dirname, "..", name),
    path.resolve(__dirname, "../../../mcp-server", name),
  ];
  return candidates.find((dir) => fs.existsSync(dir)) ?? candidates[0];
}

export function readLanguageReference(): string {
  const referencePath = path.join(packageDir("docs"), "language-reference.md");
  if (!fs.existsSync(referencePath)) {
    return "# Sprig Language Reference\n\nReference not found. Expected at: docs/language-reference.md";
  }
  return fs.readFileSync(referencePath, "utf-8");
}

/** Example programs, sorted by name. */
export function listExamples(): ExampleProgram[] {
  const dir = packageDir("examples");
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith(".sprig"))
    .sort()
    .map((filename) => ({ name: filename.replace(/\.sprig$/, ""), filename }));
}

export function readExample(example: ExampleProgram): string {
  return fs.readFileSync(path.join(packageDir("examples"), example.filename), "utf-8");
}
