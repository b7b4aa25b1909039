import { describe, it, expect, vi } from 'vitest';
import { registerBuiltins } from './index.js';
import { parseServerConfig } from '../config.js';
import { ToolRegistry } from '../registries/toolRegistry.js';
import { ResourceRegistry } from '../registries/resourceRegistry.js';
import { PromptRegistry } from '../registries/promptRegistry.js';
import { CancellationToken } from '../runtime/cancellation.js';
import { ProgressNotifier } from '../runtime/progress.js';
import { CancellationError, ToolNotFoundError } from '../../types/index.js';

function setup() {
  const config = parseServerConfig({});
  const tools = new ToolRegistry();
  const resources = new ResourceRegistry();
  const prompts = new PromptRegistry();
  registerBuiltins({
    config,
    tools,
    resources,
    prompts,
    status: () => ({ inFlight: 0 }),
  });
  return { config, tools, resources, prompts };
}

describe('built-in definitions', () => {
  it('should register the diagnostic tools, resources and prompt', () => {
    const { tools, resources, prompts } = setup();

    expect(tools.values().map((t) => t.name)).toEqual(['echo', 'sleep']);
    expect(resources.values().map((r) => r.uri)).toEqual([
      'server://config',
      'server://status',
    ]);
    expect(prompts.values().map((p) => p.name)).toEqual(['describe-tool']);
  });

  it('should echo text back', async () => {
    const { tools } = setup();
    await expect(tools.call('echo', { text: 'ping' })).resolves.toEqual({ text: 'ping' });
  });

  it('should sleep in steps and report progress', async () => {
    const { tools } = setup();
    const send = vi.fn(async (_message: object) => undefined);
    const progress = new ProgressNotifier('tok', { send, isClosed: false });

    await expect(
      tools.call('sleep', { durationMs: 30, steps: 3 }, new CancellationToken(1), progress)
    ).resolves.toEqual({ sleptMs: 30, steps: 3 });

    expect(send.mock.calls.map(([message]) => message)).toEqual([
      {
        jsonrpc: '2.0',
        method: 'notifications/progress',
        params: { progressToken: 'tok', progress: 33, total: 100, message: 'Step 1 of 3' },
      },
      {
        jsonrpc: '2.0',
        method: 'notifications/progress',
        params: { progressToken: 'tok', progress: 67, total: 100, message: 'Step 2 of 3' },
      },
      {
        jsonrpc: '2.0',
        method: 'notifications/progress',
        params: { progressToken: 'tok', progress: 100, total: 100, message: 'Step 3 of 3' },
      },
    ]);
  });

  it('should stop sleeping once cancelled', async () => {
    const { tools } = setup();
    const token = new CancellationToken('s1');

    const sleeping = tools.call('sleep', { durationMs: 60_000, steps: 1 }, token);
    token.cancel();

    await expect(sleeping).rejects.toThrow(new CancellationError('s1'));
  });

  it('should expose the effective configuration and status', async () => {
    const { config, resources } = setup();

    await expect(resources.call('server://config', { uri: 'server://config' })).resolves.toBe(
      config
    );
    await expect(resources.call('server://status', { uri: 'server://status' })).resolves.toEqual({
      inFlight: 0,
    });
  });

  it('should describe a registered tool', async () => {
    const { prompts } = setup();

    const result = await prompts
      .resolve('describe-tool')
      .handler({ tool: 'echo' }, new CancellationToken(), ProgressNotifier.disabled());
    expect(result).toMatchObject({
      description: 'Describe the echo tool',
      messages: [{ role: 'user', content: { type: 'text' } }],
    });

    const lines = (result.messages[0]?.content.text ?? '').split('\n');
    expect(lines.slice(0, 4)).toEqual([
      'Explain what the tool "echo" does and how to call it.',
      'Description: Return the given text unchanged',
      'Flags: read-only, idempotent',
      'Input schema:',
    ]);
    expect(JSON.parse(lines.slice(4).join('\n'))).toEqual({
      type: 'object',
      properties: { text: { type: 'string', description: 'Text to send back' } },
      required: ['text'],
      additionalProperties: false,
    });
  });

  it('should fail to describe an unknown tool', async () => {
    const { prompts } = setup();
    await expect(prompts.call('describe-tool', { tool: 'ghost' })).rejects.toBeInstanceOf(
      ToolNotFoundError
    );
  });
});
