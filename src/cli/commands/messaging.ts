import { Command } from 'commander';

import { loadSessionConfig, parseTopicList, type LoadConfigOptions, type SessionConfig } from '../../config/session-config.js';
import { encodeEnvelope } from '../../protocol/codec.js';
import type { Envelope } from '../../protocol/types.js';
import { PauseResumeController, processLifecycle } from '../../session/lifecycle.js';
import { TransportSession, type SessionOptions } from '../../session/transport-session.js';
import { toErrorMessage } from '../../utils/errors.js';
import { configure as configureLogging } from '../../utils/logger.js';

type ExitFn = (code: number) => never;

export interface CliSession {
  readonly paused: boolean;
  open(url: string, clearSubscriptions?: boolean): Promise<void>;
  subscribe(topic: string): Promise<void>;
  publish(topic: string, payload: string, type?: string): Promise<void>;
  close(): Promise<void>;
  pause(): Promise<void>;
  resume(): Promise<void>;
  on(event: 'message', listener: (envelope: Envelope) => void): unknown;
}

export interface MessagingDependencies {
  env: () => NodeJS.ProcessEnv;
  loadConfig: (options: LoadConfigOptions) => SessionConfig;
  createSession: (options: Partial<SessionOptions>) => CliSession;
  /** Follow host pause/resume; returns a function that stops following */
  bindLifecycle: (session: CliSession) => () => void;
  waitForShutdownSignal: () => Promise<string>;
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  exit: ExitFn;
}

interface ListenOptions {
  topic?: string[];
  config?: string;
}

interface PublishOptions {
  type: string;
  config?: string;
}

function defaultExit(code: number): never {
  process.exit(code);
}

function defaultBindLifecycle(session: CliSession): () => void {
  const controller = new PauseResumeController(session);
  controller.bind(processLifecycle());
  return () => controller.release();
}

function waitForSignal(): Promise<string> {
  return new Promise((resolve) => {
    const cleanup = () => {
      process.off('SIGINT', onSigInt);
      process.off('SIGTERM', onSigTerm);
    };

    const onSigInt = () => {
      cleanup();
      resolve('SIGINT');
    };
    const onSigTerm = () => {
      cleanup();
      resolve('SIGTERM');
    };

    process.on('SIGINT', onSigInt);
    process.on('SIGTERM', onSigTerm);
  });
}

function withDefaults(overrides: Partial<MessagingDependencies> = {}): MessagingDependencies {
  return {
    env: () => process.env,
    loadConfig: loadSessionConfig,
    createSession: (options) => new TransportSession(options),
    bindLifecycle: defaultBindLifecycle,
    waitForShutdownSignal: waitForSignal,
    log: (...args: unknown[]) => console.log(...args),
    error: (...args: unknown[]) => console.error(...args),
    exit: defaultExit,
    ...overrides,
  };
}

function sessionOptionsFrom(config: SessionConfig): Partial<SessionOptions> {
  return {
    reconnectDelayMs: config.reconnectDelayMs,
    closeTimeoutMs: config.closeTimeoutMs,
    connectTimeoutMs: config.connectTimeoutMs,
  };
}

function collectTopics(value: string, previous: string[] = []): string[] {
  return [...previous, ...parseTopicList(value)];
}

export function registerMessagingCommands(
  program: Command,
  overrides: Partial<MessagingDependencies> = {}
): void {
  const deps = withDefaults(overrides);

  const loadConfig = (configPath: string | undefined): SessionConfig | undefined => {
    try {
      const config = deps.loadConfig({ filePath: configPath, env: deps.env() });
      configureLogging({ level: config.logLevel });
      return config;
    } catch (err) {
      deps.error(toErrorMessage(err));
      deps.exit(1);
      return undefined;
    }
  };

  program
    .command('listen')
    .description('Subscribe to topics and print every received envelope as a JSON line')
    .argument('[url]', 'Endpoint URL (ws, wss, http or https); defaults to TOPICWIRE_URL')
    .option('-t, --topic <topic>', 'Topic to subscribe to (repeatable, comma-separated)', collectTopics)
    .option('-c, --config <file>', 'YAML or JSON config file')
    .action(async (urlArg: string | undefined, options: ListenOptions) => {
      const config = loadConfig(options.config);
      if (!config) return;

      const url = urlArg ?? config.url;
      if (!url) {
        deps.error('No URL given. Pass one as an argument or set TOPICWIRE_URL.');
        deps.exit(1);
        return;
      }

      const topics = [...new Set([...config.topics, ...(options.topic ?? [])])];
      if (topics.length === 0) {
        deps.error('No topics given. Use --topic or set TOPICWIRE_TOPICS.');
        deps.exit(1);
        return;
      }

      const session = deps.createSession(sessionOptionsFrom(config));
      session.on('message', (envelope) => deps.log(encodeEnvelope(envelope)));
      const unbindLifecycle = deps.bindLifecycle(session);

      let failed = false;
      try {
        await session.open(url);
        for (const topic of topics) {
          await session.subscribe(topic);
        }
        deps.error(`Listening on ${url} (${topics.join(', ')})`);

        const signal = await deps.waitForShutdownSignal();
        deps.error(`Received ${signal}, closing`);
      } catch (err) {
        deps.error(`Listen failed: ${toErrorMessage(err)}`);
        failed = true;
      } finally {
        unbindLifecycle();
        await session.close().catch((err: unknown) => {
          deps.error(`Close failed: ${toErrorMessage(err)}`);
        });
      }

      if (failed) {
        deps.exit(1);
      }
    });

  program
    .command('publish')
    .description('Publish one payload on a topic')
    .argument('<url>', 'Endpoint URL (ws, wss, http or https)')
    .argument('<topic>', 'Topic to publish on')
    .argument('<payload>', 'Payload string, typically JSON')
    .option('--type <type>', 'Envelope type', 'pub')
    .option('-c, --config <file>', 'YAML or JSON config file')
    .action(async (url: string, topic: string, payload: string, options: PublishOptions) => {
      const config = loadConfig(options.config);
      if (!config) return;

      const session = deps.createSession(sessionOptionsFrom(config));

      let failed = false;
      try {
        await session.open(url);
        await session.publish(topic, payload, options.type);
        deps.log(`Published to ${topic}`);
      } catch (err) {
        deps.error(`Publish failed: ${toErrorMessage(err)}`);
        failed = true;
      } finally {
        await session.close().catch((err: unknown) => {
          deps.error(`Close failed: ${toErrorMessage(err)}`);
        });
      }

      if (failed) {
        deps.exit(1);
      }
    });
}
