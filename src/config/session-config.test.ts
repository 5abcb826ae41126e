import { describe, expect, it, vi } from 'vitest';

import { ConfigError } from '../utils/errors.js';
import { loadSessionConfig, parseTopicList } from './session-config.js';

function files(contents: Record<string, string>) {
  return vi.fn((filePath: string) => {
    const found = contents[filePath];
    if (found === undefined) {
      throw new Error(`ENOENT: ${filePath}`);
    }
    return found;
  });
}

describe('loadSessionConfig', () => {
  it('returns defaults when nothing is configured', () => {
    expect(loadSessionConfig({ env: {} })).toEqual({
      topics: [],
      reconnectDelayMs: 2000,
      closeTimeoutMs: 5000,
      connectTimeoutMs: 10000,
      logLevel: 'info',
    });
  });

  it('reads a YAML file', () => {
    const readFile = files({
      'topicwire.yaml': ['url: wss://bridge.example.test', 'topics:', '  - prices', '  - orders', 'reconnectDelayMs: 750'].join(
        '\n'
      ),
    });

    const config = loadSessionConfig({ filePath: 'topicwire.yaml', env: {}, readFile });

    expect(readFile).toHaveBeenCalledWith('topicwire.yaml');
    expect(config.url).toBe('wss://bridge.example.test');
    expect(config.topics).toEqual(['prices', 'orders']);
    expect(config.reconnectDelayMs).toBe(750);
  });

  it('reads a JSON file', () => {
    const readFile = files({ 'topicwire.json': '{"url":"ws://localhost:9000","logLevel":"debug"}' });
    const config = loadSessionConfig({ filePath: 'topicwire.json', env: {}, readFile });
    expect(config.url).toBe('ws://localhost:9000');
    expect(config.logLevel).toBe('debug');
  });

  it('lets the environment override the file', () => {
    const readFile = files({ 'topicwire.yaml': 'url: ws://from-file\nreconnectDelayMs: 750\n' });
    const config = loadSessionConfig({
      filePath: 'topicwire.yaml',
      readFile,
      env: {
        TOPICWIRE_URL: ' ws://from-env ',
        TOPICWIRE_TOPICS: 'a, b,,c',
        TOPICWIRE_RECONNECT_DELAY_MS: '500',
        TOPICWIRE_LOG_LEVEL: '',
      },
    });

    expect(config.url).toBe('ws://from-env');
    expect(config.topics).toEqual(['a', 'b', 'c']);
    expect(config.reconnectDelayMs).toBe(500);
    expect(config.logLevel).toBe('info');
  });

  it('treats an empty file as no settings', () => {
    const config = loadSessionConfig({ filePath: 'empty.yaml', env: {}, readFile: files({ 'empty.yaml': '' }) });
    expect(config.topics).toEqual([]);
  });

  it('rejects invalid values with their path', () => {
    expect(() => loadSessionConfig({ env: { TOPICWIRE_CLOSE_TIMEOUT_MS: 'soon' } })).toThrow(
      /^Invalid configuration: closeTimeoutMs: /
    );
    expect(() => loadSessionConfig({ env: { TOPICWIRE_RECONNECT_DELAY_MS: '-5' } })).toThrow(ConfigError);
    expect(() => loadSessionConfig({ env: { TOPICWIRE_LOG_LEVEL: 'verbose' } })).toThrow(
      /^Invalid configuration: logLevel: /
    );
  });

  it('reports unreadable and unparsable files', () => {
    expect(() => loadSessionConfig({ filePath: 'missing.yaml', env: {}, readFile: files({}) })).toThrow(
      'Cannot read config file missing.yaml: ENOENT: missing.yaml'
    );
    expect(() =>
      loadSessionConfig({ filePath: 'broken.json', env: {}, readFile: files({ 'broken.json': '{url:' }) })
    ).toThrow(/^Cannot parse config file broken\.json: /);
  });

  it('requires a mapping at the top level', () => {
    const readFile = files({ 'list.yaml': '- prices\n- orders\n' });
    expect(() => loadSessionConfig({ filePath: 'list.yaml', env: {}, readFile })).toThrow(
      'Config file list.yaml must contain a mapping'
    );
  });
});

describe('parseTopicList', () => {
  it('splits on commas and drops blanks', () => {
    expect(parseTopicList(' prices ,orders,, ')).toEqual(['prices', 'orders']);
  });
});
