import type { ZodType } from 'zod';

import type { JsonObject } from '../@types';
import { logger } from '../shared/logger';

export type ToolResult = { value: string } | { error: string };

export interface ToolDefinition<TArgs> {
  name: string;
  description: string;
  argsSchema: ZodType<TArgs>;
  argsHint: Record<string, string>;
  execute(args: TArgs): ToolResult | Promise<ToolResult>;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  argsHint: Record<string, string>;
}

interface RegisteredTool {
  descriptor: ToolDescriptor;
  invoke(args: JsonObject): Promise<ToolResult>;
}

export const isToolError = (result: ToolResult): result is { error: string } => {
  return 'error' in result;
};

export const toolResultText = (result: ToolResult): string => {
  return isToolError(result) ? result.error : result.value;
};

/**
 * Maps tool names to executors. `invoke` never throws: argument validation failures and
 * executor exceptions come back as `{ error }` so the loop can hand them to the model.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  public register<TArgs>(definition: ToolDefinition<TArgs>): void {
    if (this.tools.has(definition.name)) {
      throw new Error(`Tool ${definition.name} is already registered.`);
    }

    this.tools.set(definition.name, {
      descriptor: {
        name: definition.name,
        description: definition.description,
        argsHint: definition.argsHint,
      },
      invoke: async (args) => {
        const parsed = definition.argsSchema.safeParse(args);

        if (!parsed.success) {
          const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || 'args'}: ${issue.message}`)
            .join('; ');
          return { error: `Error: Invalid arguments for ${definition.name} (${issues})` };
        }

        return definition.execute(parsed.data);
      },
    });
  }

  public has(name: string): boolean {
    return this.tools.has(name);
  }

  public getToolNames(): string[] {
    return [...this.tools.keys()].sort();
  }

  public describe(): ToolDescriptor[] {
    return this.getToolNames()
      .map((name) => this.tools.get(name)?.descriptor)
      .filter((descriptor): descriptor is ToolDescriptor => descriptor !== undefined);
  }

  public async invoke(name: string, args: JsonObject): Promise<ToolResult> {
    const tool = this.tools.get(name);

    if (!tool) {
      return { error: `Error: Unknown tool '${name}'` };
    }

    try {
      return await tool.invoke(args);
    } catch (error: unknown) {
      logger.warn('tool_execution_failed', {
        tool: name,
        error: error instanceof Error ? error.message : String(error),
      });
      return {
        error: `Error: Tool ${name} failed (${error instanceof Error ? error.message : String(error)})`,
      };
    }
  }
}
