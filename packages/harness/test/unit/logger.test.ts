/**
 * Logger: Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from '../../src/utils/logger.js';

describe('silentLogger', () => {
  it('hands every caller the same instance', () => {
    expect(silentLogger()).toBe(silentLogger());
  });

  it('discards every level', () => {
    const logger = silentLogger();

    expect(logger.level).toBe('silent');
    expect(logger.isLevelEnabled('error')).toBe(false);
  });
});

describe('createLogger', () => {
  it('applies the requested level', () => {
    const logger = createLogger({ level: 'warn', service: 'test', fd: 2 });

    expect(logger.isLevelEnabled('warn')).toBe(true);
    expect(logger.isLevelEnabled('info')).toBe(false);
  });
});
