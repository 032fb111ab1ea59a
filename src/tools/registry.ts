import type { Logger } from 'pino';
import type { ZodType } from 'zod/v4';

import type { SafeMode } from '../config.js';
import { errorMessage } from '../errors.js';
import type { HomeAssistantClient } from '../homeassistant/client.js';
import type { ToolArgs } from './args.js';
import { errorResult, type ToolResult } from './results.js';

export interface ToolContext {
  client: HomeAssistantClient;
  logger: Logger;
  signal?: AbortSignal;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, ZodType>;
  /** Changes Home Assistant state; refused when the server runs read-only. */
  mutating: boolean;
  handler(ctx: ToolContext, args: ToolArgs): Promise<ToolResult>;
}

export interface ToolRegistryOptions {
  safeMode: SafeMode;
  logger: Logger;
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(private readonly options: ToolRegistryOptions) {}

  register(...tools: ToolDefinition[]): this {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Tool registered twice: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
    return this;
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  async call(name: string, args: ToolArgs, ctx: ToolContext): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return errorResult(`Unknown tool: ${name}`);
    }

    if (tool.mutating && this.options.safeMode === 'read_only') {
      this.options.logger.warn({ tool: name }, 'Refused mutating tool in read-only mode');
      return errorResult(`Server is running in read-only mode (HA_SAFE_MODE=read_only); ${name} is disabled.`);
    }

    const startedAt = Date.now();
    try {
      const result = await tool.handler(ctx, args);
      this.options.logger.debug(
        { tool: name, isError: result.isError === true, durationMs: Date.now() - startedAt },
        'Tool call finished'
      );
      return result;
    } catch (error) {
      this.options.logger.error({ tool: name, error: errorMessage(error) }, 'Tool handler failed');
      return errorResult(`Error running ${name}: ${errorMessage(error)}`);
    }
  }
}
