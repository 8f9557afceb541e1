import { describe, it, expect } from 'vitest';
import { createLogger } from '../../src/infrastructure/logger.js';

describe('createLogger', () => {
  it('defaults to info', () => {
    expect(createLogger({}, {}).level).toBe('info');
  });

  it('reads the level from the environment', () => {
    expect(createLogger({}, { LOG_LEVEL: 'warn' }).level).toBe('warn');
    expect(createLogger({}, { ANALYTICS_LOG_LEVEL: 'debug', LOG_LEVEL: 'warn' }).level).toBe('debug');
  });

  it('an explicit level wins', () => {
    expect(createLogger({ level: 'error' }, { LOG_LEVEL: 'warn' }).level).toBe('error');
  });
});
