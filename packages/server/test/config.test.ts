import { Type } from '@sinclair/typebox';
import { describe, expect, it } from 'vitest';
import { ConfigError, Executor, createLogger, resolveConfig } from '../src';

function issuesOf(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  throw new Error('Expected a ConfigError');
}

describe('resolveConfig', () => {
  it('fills in defaults', () => {
    const config = resolveConfig({});
    expect(config).toMatchObject({
      host: '127.0.0.1',
      port: 8080,
      chunkSize: 16 * 1024 * 1024,
      inbuf: 100,
      backlog: 1024,
      keepAlive: false,
      idleTimeout: 60_000,
      handlerTimeout: 0,
    });
    expect(config.executor.size).toBe(10);
  });

  it('sizes the executor from workers', () => {
    expect(resolveConfig({ workers: 3 }).executor.size).toBe(3);
  });

  it('uses a given executor and logger', () => {
    const executor = new Executor(1);
    const logger = createLogger('silent');
    const config = resolveConfig({ executor, logger });
    expect(config.executor).toBe(executor);
    expect(config.logger).toBe(logger);
  });

  it('reports every invalid value', () => {
    const issues = issuesOf(() => resolveConfig({ port: 70_000, inbuf: 0 }));
    expect(issues).toHaveLength(2);
    expect(issues.some((issue) => issue.startsWith('/port: '))).toBe(true);
    expect(issues.some((issue) => issue.startsWith('/inbuf: '))).toBe(true);
  });

  it('rejects unknown options', () => {
    const options = { port: 0, aggregateLength: 1024 };
    const issues = issuesOf(() => resolveConfig(options));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^\/aggregateLength: /);
  });

  it('accepts options declared by an extension', () => {
    const valid = { port: 0, tls: true };
    const invalid = { port: 0, tls: 'yes' };
    expect(() => resolveConfig(valid, { tls: Type.Boolean() })).not.toThrow();
    expect(issuesOf(() => resolveConfig(invalid, { tls: Type.Boolean() }))).toEqual([
      expect.stringMatching(/^\/tls: /),
    ]);
  });

  it('puts the issues in the error message', () => {
    expect(() => resolveConfig({ backlog: 0 })).toThrow(/^Invalid server options: \/backlog: /);
  });
});
