/**
 * Tests for configuration, log levels and CLI arguments
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, resolveDatabasePath } from '../src/config.js';
import { parseLogLevel } from '../src/logger.js';
import { parseArgs } from '../src/cli.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ DATABASE_URL: 'data/laundry.db' });

    expect(config).toEqual({
      databasePath: 'data/laundry.db',
      host: '127.0.0.1',
      port: 8080,
      logLevel: 'warn',
      corsOrigins: [],
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      DATABASE_URL: 'sqlite:///var/lib/laundry.db',
      HOST: '0.0.0.0',
      PORT: '9000',
      LOG_LEVEL: 'debug',
      CORS_ORIGINS: 'http://a.test, http://b.test,',
    });

    expect(config).toEqual({
      databasePath: '/var/lib/laundry.db',
      host: '0.0.0.0',
      port: 9000,
      logLevel: 'debug',
      corsOrigins: ['http://a.test', 'http://b.test'],
    });
  });

  it('requires DATABASE_URL', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow('Invalid configuration: DATABASE_URL is required');
    expect(() => loadConfig({ DATABASE_URL: '   ' })).toThrow('DATABASE_URL is required');
  });

  it('rejects an out-of-range port', () => {
    expect(() => loadConfig({ DATABASE_URL: ':memory:', PORT: '70000' })).toThrow(/PORT/);
  });
});

describe('resolveDatabasePath', () => {
  it('strips sqlite and file schemes', () => {
    expect(resolveDatabasePath('sqlite://data/laundry.db')).toBe('data/laundry.db');
    expect(resolveDatabasePath('sqlite:data/laundry.db')).toBe('data/laundry.db');
    expect(resolveDatabasePath('file:/tmp/laundry.db')).toBe('/tmp/laundry.db');
  });

  it('leaves plain paths and :memory: alone', () => {
    expect(resolveDatabasePath('/srv/laundry.db')).toBe('/srv/laundry.db');
    expect(resolveDatabasePath(':memory:')).toBe(':memory:');
  });
});

describe('parseLogLevel', () => {
  it('maps the supported names case-insensitively', () => {
    expect(parseLogLevel('ERROR')).toBe('error');
    expect(parseLogLevel('warning')).toBe('warn');
    expect(parseLogLevel('Info')).toBe('info');
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('trace')).toBe('trace');
    expect(parseLogLevel('OFF')).toBe('silent');
  });

  it('falls back to warn', () => {
    expect(parseLogLevel(undefined)).toBe('warn');
    expect(parseLogLevel('verbose')).toBe('warn');
  });
});

describe('parseArgs', () => {
  it('defaults to serve', () => {
    expect(parseArgs([])).toEqual({ command: 'serve' });
  });

  it('reads command and options', () => {
    expect(parseArgs(['serve', '--host', '0.0.0.0', '-p', '3000'])).toEqual({
      command: 'serve',
      host: '0.0.0.0',
      port: 3000,
    });
    expect(parseArgs(['migrate'])).toEqual({ command: 'migrate' });
    expect(parseArgs(['--help'])).toEqual({ command: 'help' });
  });

  it('rejects bad input', () => {
    expect(() => parseArgs(['--port', 'abc'])).toThrow('--port requires a number');
    expect(() => parseArgs(['--host'])).toThrow('--host requires a value');
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown argument: --verbose');
  });
});
