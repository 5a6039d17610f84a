import { describe, it, expect, afterEach, vi } from 'vitest';
import type { PassThrough } from 'stream';
import { MCPServer, SERVER_NAME, ShutdownManager, createEngine } from '../../src/server.js';
import { ConfigSchema, type Config } from '../../src/config.js';
import { DiceEngine } from '../../src/dice/engine.js';
import { PROTOCOL_VERSION } from '../../src/protocol/lifecycle.js';
import { createNotification, createRequest } from '../../src/protocol/jsonrpc.js';
import {
  CollectingStream,
  createMemoryLogger,
  createMockStdin,
  createScriptedRandom,
  sendLine,
  waitFor,
} from '../helpers/index.js';

const initializeParams = {
  protocolVersion: PROTOCOL_VERSION,
  capabilities: {},
  clientInfo: { name: 'test-client', version: '1.0.0' },
};

describe('ShutdownManager', () => {
  function createManager(timeoutMs = 1000): ShutdownManager {
    return new ShutdownManager({ timeoutMs, exitProcess: false, logger: createMemoryLogger('shutdown').logger });
  }

  it('should run cleanup handlers in registration order', async () => {
    const manager = createManager();
    const order: string[] = [];
    manager.register('first', async () => {
      order.push('first');
    });
    manager.register('second', async () => {
      order.push('second');
    });

    await manager.initiateShutdown('test');

    expect(order).toEqual(['first', 'second']);
    expect(manager.isShuttingDown()).toBe(true);
  });

  it('should keep going when a cleanup handler fails', async () => {
    const manager = createManager();
    const after = vi.fn(async () => undefined);
    manager.register('broken', async () => {
      throw new Error('boom');
    });
    manager.register('after', after);

    await manager.initiateShutdown();

    expect(after).toHaveBeenCalledTimes(1);
  });

  it('should shut down only once', async () => {
    const onShutdown = vi.fn(async () => undefined);
    const manager = new ShutdownManager({ timeoutMs: 1000, exitProcess: false, onShutdown });

    await Promise.all([manager.initiateShutdown(), manager.initiateShutdown()]);
    await manager.initiateShutdown();

    expect(onShutdown).toHaveBeenCalledTimes(1);
  });

  it('should wait for in-flight requests', async () => {
    const manager = createManager();
    const cleanup = vi.fn(async () => undefined);
    manager.register('stdio', cleanup);
    manager.trackRequest('7');

    const done = manager.initiateShutdown();
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(cleanup).not.toHaveBeenCalled();

    manager.completeRequest('7');
    await done;
    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it('should stop waiting after the timeout', async () => {
    const manager = createManager(60);
    const cleanup = vi.fn(async () => undefined);
    manager.register('stdio', cleanup);
    manager.trackRequest('stuck');

    await manager.initiateShutdown();

    expect(cleanup).toHaveBeenCalledTimes(1);
    expect(manager.getInFlightCount()).toBe(1);
  });

  it('should refuse new work once shutting down', async () => {
    const manager = createManager();
    await manager.initiateShutdown();

    manager.trackRequest('late');
    expect(manager.getInFlightCount()).toBe(0);
    expect(() => manager.register('late', async () => undefined)).toThrow(
      'Cannot register cleanup handlers during shutdown'
    );
  });
});

describe('MCPServer', () => {
  let server: MCPServer | null = null;

  afterEach(async () => {
    await server?.stop('test done');
    server = null;
  });

  function startServer(
    values: number[],
    config: Config = ConfigSchema.parse({}),
    withMemoryLogger = true
  ): { stdin: PassThrough; stdout: CollectingStream; instance: MCPServer } {
    const stdin = createMockStdin();
    const stdout = new CollectingStream();
    const options = {
      config,
      engine: new DiceEngine({ random: createScriptedRandom(values) }),
      stdin,
      stdout,
      exitProcess: false,
      handleSignals: false,
    };
    const instance = withMemoryLogger
      ? new MCPServer({ ...options, logger: createMemoryLogger('dice').logger })
      : new MCPServer(options);
    server = instance;
    return { stdin, stdout, instance };
  }

  async function handshake(stdin: PassThrough, stdout: CollectingStream, instance: MCPServer): Promise<void> {
    sendLine(stdin, createRequest(1, 'initialize', initializeParams));
    await waitFor(() => stdout.messages().length >= 1);
    sendLine(stdin, createNotification('notifications/initialized'));
    await waitFor(() => instance.getLifecycleManager().getState() === 'ready');
  }

  it('should register the four dice tools', () => {
    const { instance } = startServer([]);
    expect(instance.getToolRegistry().getAllTools().map((tool) => tool.name)).toEqual([
      'roll',
      'roll_detailed',
      'roll_batch',
      'validate_syntax',
    ]);
  });

  it('should answer initialize with the server info', async () => {
    const { stdin, stdout, instance } = startServer([]);
    await instance.start();

    sendLine(stdin, createRequest(1, 'initialize', initializeParams));
    await waitFor(() => stdout.messages().length === 1);

    expect(stdout.messages()[0]).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      result: {
        protocolVersion: PROTOCOL_VERSION,
        serverInfo: { name: SERVER_NAME, version: '1.0.0', title: 'Dice Roller' },
      },
    });
  });

  it('should roll over stdio after the handshake', async () => {
    const { stdin, stdout, instance } = startServer([12]);
    await instance.start();
    await handshake(stdin, stdout, instance);

    sendLine(stdin, createRequest(2, 'tools/call', { name: 'roll', arguments: { expression: '1d20+5' } }));
    await waitFor(() => stdout.messages().length === 2);

    expect(stdout.messages()[1]).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: {
        content: [{ type: 'text', text: '{"total":17,"result":"1d20 (12) + 5 = `17`"}' }],
        structuredContent: { total: 17, result: '1d20 (12) + 5 = `17`' },
      },
    });
  });

  it('should reject requests before the handshake', async () => {
    const { stdin, stdout, instance } = startServer([]);
    await instance.start();

    sendLine(stdin, createRequest(3, 'tools/list'));
    await waitFor(() => stdout.messages().length === 1);

    expect(stdout.messages()[0]).toEqual({
      jsonrpc: '2.0',
      id: 3,
      error: { code: -32600, message: 'Server not initialized. Send initialize request first.' },
    });
  });

  it('should answer invalid JSON with a parse error', async () => {
    const { stdin, stdout, instance } = startServer([]);
    await instance.start();

    sendLine(stdin, '{not json');
    await waitFor(() => stdout.messages().length === 1);

    expect(stdout.messages()[0]).toMatchObject({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32700, message: 'Parse error: Invalid JSON' },
    });
  });

  it('should reply with the id of a malformed request', async () => {
    const { stdin, stdout, instance } = startServer([]);
    await instance.start();

    sendLine(stdin, { jsonrpc: '2.0', id: 9, method: 42 });
    await waitFor(() => stdout.messages().length === 1);

    expect(stdout.messages()[0]).toEqual({
      jsonrpc: '2.0',
      id: 9,
      error: { code: -32600, message: 'Invalid Request: method must be a string' },
    });
  });

  it('should shut down when stdin ends', async () => {
    const { stdin, instance } = startServer([]);
    await instance.start();
    expect(instance.isAcceptingRequests()).toBe(true);

    stdin.end();
    await waitFor(() => instance.getLifecycleManager().getState() === 'shutting_down');

    expect(instance.isAcceptingRequests()).toBe(false);
  });

  it('should answer a request that arrives just before stdin ends', async () => {
    const { stdin, stdout, instance } = startServer([4]);
    await instance.start();
    await handshake(stdin, stdout, instance);

    sendLine(stdin, createRequest(4, 'tools/call', { name: 'roll', arguments: { expression: '1d6' } }));
    stdin.end();
    await waitFor(() => instance.getLifecycleManager().getState() === 'shutting_down');

    expect(stdout.messages()).toContainEqual({
      jsonrpc: '2.0',
      id: 4,
      result: {
        content: [{ type: 'text', text: '{"total":4,"result":"1d6 (4) = `4`"}' }],
        structuredContent: { total: 4, result: '1d6 (4) = `4`' },
      },
    });
  });

  it('should track requests whose ids only differ by type', async () => {
    const { stdin, stdout, instance } = startServer([]);
    await instance.start();
    await handshake(stdin, stdout, instance);

    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let started = 0;
    instance.getToolRegistry().registerTool({
      name: 'hold',
      description: 'Waits until released',
      inputSchema: { type: 'object', properties: {} },
      handler: async () => {
        started += 1;
        await gate;
        return { content: [{ type: 'text', text: 'done' }] };
      },
    });

    sendLine(stdin, createRequest(7, 'tools/call', { name: 'hold', arguments: {} }));
    sendLine(stdin, createRequest('7', 'tools/call', { name: 'hold', arguments: {} }));
    await waitFor(() => started === 2);

    expect(instance.getShutdownManager()?.getInFlightCount()).toBe(2);

    release();
    await waitFor(() => stdout.messages().length === 3);

    expect(instance.getShutdownManager()?.getInFlightCount()).toBe(0);
    expect(stdout.messages()).toContainEqual({
      jsonrpc: '2.0',
      id: 7,
      result: { content: [{ type: 'text', text: 'done' }] },
    });
    expect(stdout.messages()).toContainEqual({
      jsonrpc: '2.0',
      id: '7',
      result: { content: [{ type: 'text', text: 'done' }] },
    });
  });

  it('should forward log records to an initialized client', async () => {
    const { stdin, stdout, instance } = startServer([], ConfigSchema.parse({ logLevel: 'warning' }), false);
    await instance.start();
    await handshake(stdin, stdout, instance);

    sendLine(stdin, createRequest(5, 'tools/call', { name: 'nope', arguments: {} }));
    await waitFor(() => stdout.messages().length === 3);

    const [, notification, response] = stdout.messages();
    expect(notification).toEqual({
      jsonrpc: '2.0',
      method: 'notifications/message',
      params: {
        level: 'warning',
        message: 'Unknown tool requested',
        logger: 'dice.tools',
        data: { tool: 'nope' },
      },
    });
    expect(response).toMatchObject({ id: 5, result: { isError: true } });
  });

  it('should start only once', async () => {
    const { instance } = startServer([]);
    await instance.start();
    const manager = instance.getShutdownManager();
    await instance.start();

    expect(instance.isStarted()).toBe(true);
    expect(instance.getShutdownManager()).toBe(manager);
  });
});

describe('createEngine', () => {
  it('should apply the configured limits', () => {
    const engine = createEngine(ConfigSchema.parse({ maxDice: 5, maxRerolls: 7 }));
    expect(engine.getLimits()).toMatchObject({ maxDice: 5, maxRerolls: 7 });
  });

  it('should repeat rolls for the same seed', () => {
    const config = ConfigSchema.parse({ seed: 'test-seed' });
    const first = createEngine(config).roll('10d20');
    const second = createEngine(config).roll('10d20');

    expect(first.rendered).toBe(second.rendered);
    expect(first.total).toBe(second.total);
  });
});
