import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

export interface ServerInfo {
  name: string;
  version: string;
}

let serverInfoCache: ServerInfo | null = null;

function stringField(source: unknown, key: string): string | undefined {
  if (typeof source !== 'object' || source === null || !(key in source)) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Name and version reported in the `initialize` handshake, read once from
 * package.json
 */
export function getServerInfo(): ServerInfo {
  if (!serverInfoCache) {
    const packageJsonPath = join(
      dirname(fileURLToPath(import.meta.url)),
      '../../../package.json'
    );

    let packageJson: unknown;
    try {
      packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    } catch (error) {
      throw new Error(
        `Failed to read package.json: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    serverInfoCache = {
      name: stringField(packageJson, 'name') ?? 'mcp-stdio-host',
      version: stringField(packageJson, 'version') ?? 'dev',
    };
  }

  return serverInfoCache;
}
