/**
 * Sprig MCP Server
 *
 * Exposes evaluation, formatting and tokenizing of Sprig expressions, plus
 * the grammar reference, over the Model Context Protocol.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import * as fs from "fs";
import * as path from "path";
import {
  evaluateInput,
  expressionInput,
  handleEvaluate,
  handleFormat,
  handleTokenize,
} from "./tools";

const server = new McpServer({
  name: "sprig",
  version: "0.1.0",
});

// -- Register tools -----------------------------------------------------------

server.registerTool(
  "sprig_evaluate",
  {
    description:
      "Evaluate a Sprig expression to a 32-bit integer. Forms: (add a b), (mult a b), " +
      "(let name value ... body). Sub-expressions are separated by exactly one space.",
    inputSchema: evaluateInput,
  },
  handleEvaluate,
);

server.registerTool(
  "sprig_format",
  {
    description: "Rewrite a Sprig expression's whitespace into the canonical single-space form.",
    inputSchema: expressionInput,
  },
  handleFormat,
);

server.registerTool(
  "sprig_tokenize",
  {
    description: "List the tokens of a Sprig expression with their kinds and positions.",
    inputSchema: expressionInput,
  },
  handleTokenize,
);

// -- Register resources -------------------------------------------------------

server.registerResource(
  "grammar-reference",
  "sprig://grammar",
  {
    description: "EBNF grammar of the Sprig expression language.",
    mimeType: "text/plain",
  },
  async (uri) => {
    const grammarPath = path.resolve(__dirname, "../../grammar/sprig.ebnf");
    let text: string;
    try {
      text = fs.readFileSync(grammarPath, "utf-8");
    } catch {
      text = "(grammar reference not found -- expected at grammar/sprig.ebnf)";
    }
    return {
      contents: [{ uri: uri.href, text, mimeType: "text/plain" }],
    };
  },
);

// -- start --------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error("Fatal error starting Sprig MCP server:", err);
  process.exit(1);
});
