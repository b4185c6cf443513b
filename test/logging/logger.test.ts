import { describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, errorMessage, isLogLevel, silentLogger } from '../../src/logging/logger.js';

describe('ConsoleLogger', () => {
  it('drops messages below its level', () => {
    const sink = vi.fn();
    const logger = new ConsoleLogger({ level: 'warn', sink });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('careful');

    expect(sink).toHaveBeenCalledTimes(1);
    expect(sink).toHaveBeenCalledWith('[mcp-sessions] WARN careful');
  });

  it('appends metadata as JSON', () => {
    const sink = vi.fn();
    const logger = new ConsoleLogger({ sink });

    logger.error('failed', { code: 1 });
    logger.info('plain', {});

    expect(sink.mock.calls).toEqual([['[mcp-sessions] ERROR failed {"code":1}'], ['[mcp-sessions] INFO plain']]);
  });

  it('scopes child loggers and lets them pick their own level', () => {
    const sink = vi.fn();
    const logger = new ConsoleLogger({ level: 'info', prefix: '[svc]', sink });

    logger.child('session abc').debug('hidden');
    logger.child('session abc').info('hello');
    logger.child('session xyz', 'debug').debug('visible');

    expect(sink.mock.calls).toEqual([['[svc] [session abc] INFO hello'], ['[svc] [session xyz] DEBUG visible']]);
  });

  it('reports which levels are enabled', () => {
    const logger = new ConsoleLogger({ level: 'info', sink: () => {} });

    expect(logger.isEnabled('debug')).toBe(false);
    expect(logger.isEnabled('info')).toBe(true);
    expect(logger.isEnabled('error')).toBe(true);
  });
});

describe('silentLogger', () => {
  it('returns itself as a child', () => {
    expect(silentLogger.child('anything')).toBe(silentLogger);
  });
});

describe('isLogLevel', () => {
  it('accepts only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
