#!/usr/bin/env node
/**
 * Sprig MCP Server
 *
 * Provides validation, parsing, execution, formatting and reference resources
 * for the Sprig language via the Model Context Protocol. Coding agents connect
 * to this server to get fast feedback on Sprig code they generate.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { handleExecute, handleFormat, handleParse, handleValidate } from "./tools";
import { listExamples, readExample, readLanguageReference } from "./resources";

export { handleExecute, handleFormat, handleParse, handleValidate, summarize } from "./tools";
export { listExamples, readExample, readLanguageReference } from "./resources";

export function createServer(): McpServer {
  const server = new McpServer({
    name: "sprig",
    version: "0.1.0",
  });

  // Registered through a plain function reference to avoid TS2589 (excessively
  // deep type instantiation) in the SDK's zod compat layer.

  (server.registerTool as Function)(
    "sprig_validate",
    {
      description:
        "Parse and type-check Sprig source without running it. Returns {valid, errors} where each error has a stage (parse or type), line, column and message. Every top-level form is checked and reports at most one error.",
      inputSchema: {
        code: z.string().describe("Sprig source code to validate"),
      },
    },
    handleValidate,
  );

  (server.registerTool as Function)(
    "sprig_parse",
    {
      description:
        "Parse Sprig source and return one entry per top-level form: its node kind, position, canonical text and a compact S-expression view of the syntax tree.",
      inputSchema: {
        code: z.string().describe("Sprig source code to parse"),
      },
    },
    handleParse,
  );

  (server.registerTool as Function)(
    "sprig_execute",
    {
      description:
        "Type-check and run a Sprig program in a fresh session. Returns captured print output and the last result as '<value>: <type>', or the first error. Forms after a failing one do not run.",
      inputSchema: {
        code: z.string().describe("Sprig program to execute"),
      },
    },
    handleExecute,
  );

  (server.registerTool as Function)(
    "sprig_format",
    {
      description:
        "Format Sprig source in the canonical style. Forms wider than maxLineWidth are broken one operand per line.",
      inputSchema: {
        code: z.string().describe("Sprig source code to format"),
        indentSize: z.number().int().min(1).optional().describe("Spaces per indentation level (default 2)"),
        maxLineWidth: z.number().int().min(1).optional().describe("Width at which forms are broken (default 80)"),
      },
    },
    handleFormat,
  );

  server.registerResource(
    "language-reference",
    "sprig://language-reference",
    {
      description: "Sprig syntax, types, special forms and built-in functions.",
      mimeType: "text/markdown",
    },
    async (uri) => ({
      contents: [{ uri: uri.href, text: readLanguageReference(), mimeType: "text/markdown" }],
    }),
  );

  for (const example of listExamples()) {
    server.registerResource(
      `example-${example.name}`,
      `sprig://examples/${example.name}`,
      {
        description: `Sprig example program: ${example.name.replace(/-/g, " ")}`,
        mimeType: "text/plain",
      },
      async (uri) => ({
        contents: [{ uri: uri.href, text: readExample(example), mimeType: "text/plain" }],
      }),
    );
  }

  return server;
}

// -- start --------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await createServer().connect(transport);
}

if (require.main === module) {
  main().catch((err) => {
    console.error("Fatal error starting Sprig MCP server:", err);
    process.exit(1);
  });
}
