import type { RegisteredTool } from "../types/tool.js";
import { ComposeError, ComposeErrorCode } from "../shared/errors.js";

const TOOL_NAME = /^cfg_[a-z][a-z0-9_]*$/;

/**
 * Registered cfg_* tools in registration order. The MCP server lists and dispatches
 * from here. A duplicate or off-namespace name is a wiring bug and fails startup.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register(tool: RegisteredTool): void {
    const name = tool.metadata.name;
    if (!TOOL_NAME.test(name)) {
      throw new ComposeError(ComposeErrorCode.INVALID_TOOL, `Tool name "${name}" must match ${TOOL_NAME.source}`, { module: tool.metadata.module });
    }
    const existing = this.tools.get(name);
    if (existing) {
      throw new ComposeError(ComposeErrorCode.INVALID_TOOL, `Tool "${name}" is already registered by module ${existing.metadata.module}`, {
        module: tool.metadata.module,
      });
    }
    this.tools.set(name, tool);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  getAll(): ReadonlyMap<string, RegisteredTool> {
    return this.tools;
  }

  /** Tool count per module, modules in first-registration order. */
  countByModule(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const tool of this.tools.values()) {
      counts[tool.metadata.module] = (counts[tool.metadata.module] ?? 0) + 1;
    }
    return counts;
  }

  get size(): number {
    return this.tools.size;
  }
}
