import type { ServerContext } from "./context.js";
import { getErrorMessage } from "../core/logging.js";

/** MCP CallTool result: one JSON text block. */
export interface McpToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError: boolean;
}

export type ToolArgs = Record<string, unknown> | undefined;

export interface CompanyTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  handler: (args: ToolArgs, ctx: ServerContext) => Promise<McpToolResult>;
}

// ============================================================================
// Argument readers
// ============================================================================

export function argText(args: ToolArgs, key: string): string {
  const val = args?.[key];
  return typeof val === "string" ? val : "";
}

/** Undefined when the caller left the toggle out, so config defaults apply. */
export function argToggle(args: ToolArgs, key: string): boolean | undefined {
  const val = args?.[key];
  return typeof val === "boolean" ? val : undefined;
}

/**
 * Read a list of company numbers position by position. Entries that are not
 * strings become null so the batch still yields a (sentinel) record for them.
 * Returns an empty list when the value is not an array.
 */
export function argCompanyNumbers(
  args: ToolArgs,
  key: string,
): Array<string | null> {
  const val = args?.[key];
  if (!Array.isArray(val)) return [];
  return val.map((v: unknown) => (typeof v === "string" ? v : null));
}

export function toMcpResult<T extends { success: boolean }>(
  result: T,
): McpToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
    isError: !result.success,
  };
}

export function errorResult(message: string): McpToolResult {
  return {
    content: [{ type: "text" as const, text: `Error: ${message}` }],
    isError: true,
  };
}

/**
 * Name-indexed set of company tools. Dispatch never throws: unknown names
 * and handler failures come back as error results.
 */
export class CompanyToolRegistry {
  private readonly byName: ReadonlyMap<string, CompanyTool>;

  constructor(tools: CompanyTool[]) {
    const byName = new Map<string, CompanyTool>();
    for (const tool of tools) {
      if (byName.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      byName.set(tool.name, tool);
    }
    this.byName = byName;
  }

  describe(): Array<Omit<CompanyTool, "handler">> {
    return [...this.byName.values()].map(({ name, description, inputSchema }) => ({
      name,
      description,
      inputSchema,
    }));
  }

  async dispatch(
    name: string,
    args: ToolArgs,
    ctx: ServerContext,
  ): Promise<McpToolResult> {
    const tool = this.byName.get(name);
    if (!tool) return errorResult(`Unknown tool: ${name}`);
    try {
      return await tool.handler(args, ctx);
    } catch (error) {
      return errorResult(getErrorMessage(error));
    }
  }
}
