import type { ResourceDefinition } from '../../types/handlers.js';
import type { ServerConfig } from '../config.js';

export function configResource(config: ServerConfig): ResourceDefinition {
  return {
    name: 'config',
    uri: 'server://config',
    description: 'Effective server configuration',
    mimeType: 'application/json',
    readOnly: true,
    idempotent: true,
    handler: () => config,
  };
}

export function statusResource(status: () => unknown): ResourceDefinition {
  return {
    name: 'status',
    uri: 'server://status',
    description: 'Concurrency counters and in-flight calls',
    mimeType: 'application/json',
    readOnly: true,
    handler: () => status(),
  };
}
