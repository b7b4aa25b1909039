import type { ServerConfig } from '../config.js';
import type { PromptRegistry } from '../registries/promptRegistry.js';
import type { ResourceRegistry } from '../registries/resourceRegistry.js';
import type { ToolRegistry } from '../registries/toolRegistry.js';
import { describeToolPrompt } from './prompts.js';
import { configResource, statusResource } from './resources.js';
import { echoTool, sleepTool } from './tools.js';

export interface BuiltinContext {
  config: ServerConfig;
  tools: ToolRegistry;
  resources: ResourceRegistry;
  prompts: PromptRegistry;
  status: () => unknown;
}

/**
 * Diagnostic definitions that make a bare `serve` useful. Registered first so
 * embedder definitions with the same key replace them.
 */
export function registerBuiltins(context: BuiltinContext): void {
  for (const tool of [echoTool, sleepTool]) {
    context.tools.register(tool);
  }
  context.resources.register(configResource(context.config));
  context.resources.register(statusResource(context.status));
  context.prompts.register(describeToolPrompt(context.tools));
}
