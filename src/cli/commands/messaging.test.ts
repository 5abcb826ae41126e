import { Command } from 'commander';
import { describe, expect, it, vi } from 'vitest';

import { loadSessionConfig } from '../../config/session-config.js';
import { createEnvelope, type Envelope } from '../../protocol/types.js';
import { configure, createLogger } from '../../utils/logger.js';
import { registerMessagingCommands, type CliSession, type MessagingDependencies } from './messaging.js';

class ExitSignal extends Error {
  constructor(public readonly code: number) {
    super(`exit:${code}`);
  }
}

class FakeSession implements CliSession {
  paused = false;
  private readonly listeners: Array<(envelope: Envelope) => void> = [];

  open = vi.fn(async (_url: string, _clearSubscriptions?: boolean) => undefined);
  subscribe = vi.fn(async (_topic: string) => undefined);
  publish = vi.fn(async (_topic: string, _payload: string, _type?: string) => undefined);
  close = vi.fn(async () => undefined);
  pause = vi.fn(async () => undefined);
  resume = vi.fn(async () => undefined);

  on(_event: 'message', listener: (envelope: Envelope) => void): this {
    this.listeners.push(listener);
    return this;
  }

  deliver(envelope: Envelope): void {
    for (const listener of this.listeners) listener(envelope);
  }
}

function createHarness(overrides: Partial<MessagingDependencies> = {}) {
  const session = new FakeSession();
  const unbind = vi.fn();

  const deps: MessagingDependencies = {
    env: vi.fn(() => ({})),
    loadConfig: vi.fn(loadSessionConfig),
    createSession: vi.fn(() => session),
    bindLifecycle: vi.fn(() => unbind),
    waitForShutdownSignal: vi.fn(async () => 'SIGINT'),
    log: vi.fn(() => undefined),
    error: vi.fn(() => undefined),
    exit: vi.fn((code: number): never => {
      throw new ExitSignal(code);
    }),
    ...overrides,
  };

  const program = new Command();
  program.exitOverride();
  registerMessagingCommands(program, deps);

  return { program, deps, session, unbind };
}

async function runCommand(program: Command, args: string[]): Promise<number | undefined> {
  try {
    await program.parseAsync(args, { from: 'user' });
    return undefined;
  } catch (error) {
    if (error instanceof ExitSignal) {
      return error.code;
    }
    throw error;
  }
}

describe('registerMessagingCommands', () => {
  it('registers listen and publish', () => {
    const { program } = createHarness();
    expect(program.commands.map((cmd) => cmd.name())).toEqual(['listen', 'publish']);
  });

  describe('listen', () => {
    it('subscribes to every topic and closes on a shutdown signal', async () => {
      const { program, deps, session, unbind } = createHarness();

      const exitCode = await runCommand(program, ['listen', 'ws://localhost:9000', '-t', 'prices,orders', '--topic', 'prices']);

      expect(exitCode).toBeUndefined();
      expect(session.open).toHaveBeenCalledWith('ws://localhost:9000');
      expect(session.subscribe.mock.calls).toEqual([['prices'], ['orders']]);
      expect(deps.error).toHaveBeenCalledWith('Listening on ws://localhost:9000 (prices, orders)');
      expect(deps.error).toHaveBeenCalledWith('Received SIGINT, closing');
      expect(deps.bindLifecycle).toHaveBeenCalledWith(session);
      expect(unbind).toHaveBeenCalledTimes(1);
      expect(session.close).toHaveBeenCalledTimes(1);
    });

    it('prints each received envelope as a JSON line', async () => {
      const session = new FakeSession();
      const waitForShutdownSignal = vi.fn(async () => {
        session.deliver(createEnvelope('prices', 'pub', '{"bid":1}'));
        return 'SIGTERM';
      });
      const { program, deps } = createHarness({ createSession: () => session, waitForShutdownSignal });

      await runCommand(program, ['listen', 'ws://localhost:9000', '-t', 'prices']);

      expect(deps.log).toHaveBeenCalledWith('{"topic":"prices","type":"pub","payload":"{\\"bid\\":1}","silent":false}');
    });

    it('takes the URL, topics and timings from the environment', async () => {
      const { program, deps, session } = createHarness({
        env: () => ({
          TOPICWIRE_URL: 'wss://bridge.example.test',
          TOPICWIRE_TOPICS: 'alerts',
          TOPICWIRE_RECONNECT_DELAY_MS: '250',
        }),
      });

      const exitCode = await runCommand(program, ['listen']);

      expect(exitCode).toBeUndefined();
      expect(deps.createSession).toHaveBeenCalledWith({
        reconnectDelayMs: 250,
        closeTimeoutMs: 5000,
        connectTimeoutMs: 10000,
      });
      expect(session.open).toHaveBeenCalledWith('wss://bridge.example.test');
      expect(session.subscribe).toHaveBeenCalledWith('alerts');
    });

    it('exits 1 without a URL', async () => {
      const { program, deps, session } = createHarness();
      const exitCode = await runCommand(program, ['listen', '-t', 'prices']);

      expect(exitCode).toBe(1);
      expect(deps.error).toHaveBeenCalledWith('No URL given. Pass one as an argument or set TOPICWIRE_URL.');
      expect(session.open).not.toHaveBeenCalled();
    });

    it('exits 1 without topics', async () => {
      const { program, deps } = createHarness();
      const exitCode = await runCommand(program, ['listen', 'ws://localhost:9000']);

      expect(exitCode).toBe(1);
      expect(deps.error).toHaveBeenCalledWith('No topics given. Use --topic or set TOPICWIRE_TOPICS.');
    });

    it('exits 1 on invalid configuration', async () => {
      const { program, deps } = createHarness({ env: () => ({ TOPICWIRE_LOG_LEVEL: 'loud' }) });
      const exitCode = await runCommand(program, ['listen', 'ws://localhost:9000', '-t', 'prices']);

      expect(exitCode).toBe(1);
      expect(deps.error).toHaveBeenCalledWith(expect.stringMatching(/^Invalid configuration: logLevel: /));
    });

    it('passes the config file path to the loader', async () => {
      const loadConfig = vi.fn(() => loadSessionConfig({ env: { TOPICWIRE_TOPICS: 'prices' } }));
      const { program } = createHarness({ loadConfig });

      await runCommand(program, ['listen', 'ws://localhost:9000', '-c', 'topicwire.yaml']);

      expect(loadConfig).toHaveBeenCalledWith({ filePath: 'topicwire.yaml', env: {} });
    });

    it('applies the configured log level', async () => {
      const { program } = createHarness({ env: () => ({ TOPICWIRE_LOG_LEVEL: 'warn' }) });
      try {
        await runCommand(program, ['listen', 'ws://localhost:9000', '-t', 'prices']);

        const log = createLogger('cli');
        expect(log.isEnabled('info')).toBe(false);
        expect(log.isEnabled('warn')).toBe(true);
      } finally {
        configure({ level: 'info' });
      }
    });

    it('reports a failed open, still closes and exits 1', async () => {
      const session = new FakeSession();
      session.open.mockRejectedValueOnce(new Error('Failed to connect to ws://localhost:9000: ECONNREFUSED'));
      const { program, deps } = createHarness({ createSession: () => session });

      const exitCode = await runCommand(program, ['listen', 'ws://localhost:9000', '-t', 'prices']);

      expect(exitCode).toBe(1);
      expect(deps.error).toHaveBeenCalledWith('Listen failed: Failed to connect to ws://localhost:9000: ECONNREFUSED');
      expect(deps.waitForShutdownSignal).not.toHaveBeenCalled();
      expect(session.close).toHaveBeenCalledTimes(1);
    });

    it('reports a failed close without failing the run', async () => {
      const session = new FakeSession();
      session.close.mockRejectedValueOnce(new Error('close frame rejected'));
      const { program, deps } = createHarness({ createSession: () => session });

      const exitCode = await runCommand(program, ['listen', 'ws://localhost:9000', '-t', 'prices']);

      expect(exitCode).toBeUndefined();
      expect(deps.error).toHaveBeenCalledWith('Close failed: close frame rejected');
    });
  });

  describe('publish', () => {
    it('publishes one payload with the default type', async () => {
      const { program, deps, session } = createHarness();

      const exitCode = await runCommand(program, ['publish', 'http://localhost:9000', 'prices', '{"bid":3}']);

      expect(exitCode).toBeUndefined();
      expect(session.open).toHaveBeenCalledWith('http://localhost:9000');
      expect(session.publish).toHaveBeenCalledWith('prices', '{"bid":3}', 'pub');
      expect(deps.log).toHaveBeenCalledWith('Published to prices');
      expect(session.close).toHaveBeenCalledTimes(1);
    });

    it('accepts a custom envelope type', async () => {
      const { program, session } = createHarness();
      await runCommand(program, ['publish', 'ws://localhost:9000', 'prices', 'x', '--type', 'data']);
      expect(session.publish).toHaveBeenCalledWith('prices', 'x', 'data');
    });

    it('exits 1 when publishing fails', async () => {
      const session = new FakeSession();
      session.publish.mockRejectedValueOnce(new Error('Session closed before the connection opened'));
      const { program, deps } = createHarness({ createSession: () => session });

      const exitCode = await runCommand(program, ['publish', 'ws://localhost:9000', 'prices', 'x']);

      expect(exitCode).toBe(1);
      expect(deps.error).toHaveBeenCalledWith('Publish failed: Session closed before the connection opened');
      expect(deps.log).not.toHaveBeenCalled();
      expect(session.close).toHaveBeenCalledTimes(1);
    });
  });
});
