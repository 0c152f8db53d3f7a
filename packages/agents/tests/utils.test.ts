import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, resolveLogLevel } from '../utils/logger.js';
import { payloadsEqual, stableStringify } from '../utils/stable-stringify.js';
import { withTimeout } from '../utils/timeout.js';
import { ConfigurationError, DecisionTimeoutError, errorMessage } from '../utils/errors.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes scoped lines to stderr above the threshold', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createLogger('Broker', 'warn');

    logger.info('hidden');
    logger.warn('careful', { cycle: 2 });
    logger.child('Network').error('down');

    expect(spy.mock.calls).toEqual([
      ['[Broker:WARN] careful', '{"cycle":2}'],
      ['[Broker.Network:ERROR] down'],
    ]);
  });

  it('parses a level case-insensitively and falls back to info', () => {
    expect(resolveLogLevel('DEBUG')).toBe('debug');
    expect(resolveLogLevel('loud')).toBe('info');
  });
});

describe('stableStringify', () => {
  it('ignores key order and undefined members', () => {
    expect(stableStringify({ b: 1, a: { d: [1, 2], c: undefined } })).toBe('{"a":{"d":[1,2]},"b":1}');
    expect(payloadsEqual({ x: 1, y: 2 }, { y: 2, x: 1 })).toBe(true);
    expect(payloadsEqual({ x: [1, 2] }, { x: [2, 1] })).toBe(false);
  });

  it('compares values the way JSON serializes them', () => {
    expect(stableStringify([NaN, undefined, null])).toBe('[null,null,null]');
    expect(payloadsEqual({ price: NaN }, { price: null })).toBe(true);
  });
});

describe('withTimeout', () => {
  it('resolves with the task result', async () => {
    await expect(withTimeout(() => 42, 50)).resolves.toBe(42);
  });

  it('rejects with a timeout error', async () => {
    await expect(withTimeout(() => new Promise(() => {}), 10)).rejects.toBeInstanceOf(DecisionTimeoutError);
  });
});

describe('errors', () => {
  it('folds issues into the message', () => {
    const err = new ConfigurationError('Invalid roster', ['a', 'b']);
    expect(err.message).toBe('Invalid roster: a; b');
    expect(err.name).toBe('ConfigurationError');
    expect(errorMessage('plain')).toBe('plain');
  });
});
