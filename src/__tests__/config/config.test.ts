import { describe, expect, it } from 'vitest';
import { loadConfig } from '../../config/index.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({ NODE_ENV: 'development', PORT: 3000, LOG_LEVEL: 'info' });
  });

  it('coerces PORT from a string', () => {
    expect(loadConfig({ PORT: '8080' }).PORT).toBe(8080);
  });

  it('accepts silent logging', () => {
    expect(loadConfig({ LOG_LEVEL: 'silent' }).LOG_LEVEL).toBe('silent');
  });

  it('rejects unknown values', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow();
    expect(() => loadConfig({ NODE_ENV: 'staging' })).toThrow();
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow();
  });
});
