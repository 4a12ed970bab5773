import { describe, it, expect } from 'vitest';
import { resolveLogLevel } from './logger';

describe('resolveLogLevel', () => {
  it('keeps pino levels and silent', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('silent')).toBe('silent');
  });

  it('falls back to info for unknown or unset levels', () => {
    expect(resolveLogLevel('verbose')).toBe('info');
    expect(resolveLogLevel('toString')).toBe('info');
    expect(resolveLogLevel(undefined)).toBe('info');
  });
});
