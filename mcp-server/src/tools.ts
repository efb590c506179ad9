/**
 * Tool handlers for the Sprig MCP server.
 *
 * Kept free of the MCP SDK so they can be exercised directly; `index.ts`
 * wires them to the transport.
 */

import { z } from "zod";
import { Interpreter } from "../../interpreter/src/interpreter";
import { tokenize } from "../../interpreter/src/lexer";
import { SprigError, errorKind } from "../../interpreter/src/errors";
import { MAX_DEPTH_LIMIT } from "../../interpreter/src/config";
import { formatExpression } from "../../formatter/src/formatter";

export const evaluateInput = {
  expression: z.string().describe("A single Sprig expression, e.g. (let x 2 (add x 1))"),
  maxDepth: z
    .number()
    .int()
    .positive()
    .max(MAX_DEPTH_LIMIT)
    .optional()
    .describe(`Maximum expression nesting (default 1000, at most ${MAX_DEPTH_LIMIT})`),
};

export const expressionInput = {
  expression: z.string().describe("A single Sprig expression"),
};

const evaluateArgs = z.object(evaluateInput);
const expressionArgs = z.object(expressionInput);

export type EvaluateArgs = z.infer<typeof evaluateArgs>;
export type ExpressionArgs = z.infer<typeof expressionArgs>;

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

function jsonResult(result: Record<string, unknown>, isError = false): ToolResult {
  const out: ToolResult = {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
  };
  if (isError) out.isError = true;
  return out;
}

function errorResult(error: SprigError): ToolResult {
  return jsonResult({ success: false, errorKind: errorKind(error), error: error.message }, true);
}

export async function handleEvaluate(args: EvaluateArgs): Promise<ToolResult> {
  let interpreter: Interpreter;
  try {
    interpreter = new Interpreter(args.maxDepth !== undefined ? { maxDepth: args.maxDepth } : {});
  } catch (e) {
    if (e instanceof SprigError) return errorResult(e);
    throw e;
  }
  const outcome = interpreter.tryEvaluate(args.expression);
  if (!outcome.ok) {
    return errorResult(outcome.error);
  }
  return jsonResult({ success: true, value: outcome.value });
}

export async function handleFormat(args: ExpressionArgs): Promise<ToolResult> {
  try {
    return jsonResult({ success: true, formatted: formatExpression(args.expression) });
  } catch (e) {
    if (e instanceof SprigError) return errorResult(e);
    throw e;
  }
}

export async function handleTokenize(args: ExpressionArgs): Promise<ToolResult> {
  try {
    const tokens = tokenize(args.expression).map(t => ({
      kind: t.kind,
      text: t.text,
      position: t.position,
    }));
    return jsonResult({ success: true, tokens });
  } catch (e) {
    if (e instanceof SprigError) return errorResult(e);
    throw e;
  }
}
