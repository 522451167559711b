import { describe, it, expect } from 'vitest';
import { DEFAULT_LOG_FILE, buildTransport, resolveLevel, resolveLogFile } from '../logger.js';

describe('resolveLogFile', () => {
  it('falls back to the default path when LOG_FILE is unset', () => {
    expect(resolveLogFile(undefined)).toBe('./data/logs/etl.log');
    expect(DEFAULT_LOG_FILE).toBe('./data/logs/etl.log');
  });

  it('turns file logging off for an empty value', () => {
    expect(resolveLogFile('')).toBeNull();
    expect(resolveLogFile('   ')).toBeNull();
  });

  it('keeps an explicit path', () => {
    expect(resolveLogFile(' /var/log/etl.log ')).toBe('/var/log/etl.log');
  });
});

describe('resolveLevel', () => {
  it('uses a known LOG_LEVEL regardless of case', () => {
    expect(resolveLevel('WARN', 'production')).toBe('warn');
  });

  it('defaults by environment', () => {
    expect(resolveLevel(undefined, 'production')).toBe('info');
    expect(resolveLevel(undefined, 'development')).toBe('debug');
    expect(resolveLevel(undefined, 'test')).toBe('silent');
    expect(resolveLevel('loud', 'production')).toBe('info');
  });
});

describe('buildTransport', () => {
  it('writes JSON to stdout and the log file in production', () => {
    expect(buildTransport({ isDevelopment: false, level: 'info', logFile: DEFAULT_LOG_FILE })).toEqual({
      targets: [
        { target: 'pino/file', level: 'info', options: { destination: 1 } },
        { target: 'pino/file', level: 'info', options: { destination: './data/logs/etl.log', mkdir: true } },
      ],
    });
  });

  it('pretty-prints to the console beside the file in development', () => {
    const transport = buildTransport({ isDevelopment: true, level: 'debug', logFile: '/tmp/etl.log' });

    expect(transport).toEqual({
      targets: [
        expect.objectContaining({ target: 'pino-pretty', level: 'debug' }),
        { target: 'pino/file', level: 'debug', options: { destination: '/tmp/etl.log', mkdir: true } },
      ],
    });
  });

  it('uses a single console destination without a file', () => {
    expect(buildTransport({ isDevelopment: false, level: 'info', logFile: null })).toBeUndefined();
    expect(buildTransport({ isDevelopment: true, level: 'debug', logFile: null })).toEqual(
      expect.objectContaining({ target: 'pino-pretty' })
    );
  });

  it('opens no file when logging is silenced', () => {
    expect(buildTransport({ isDevelopment: false, level: 'silent', logFile: DEFAULT_LOG_FILE })).toBeUndefined();
  });
});
