/**
 * Unit tests for logger construction
 */

import { describe, test, expect } from '@jest/globals';

import { createLogger, hashCredential } from '../../src/infrastructure/logging/logger.js';

describe('createLogger', () => {
  test('should log at info to stderr by default', () => {
    const logger = createLogger();

    expect(logger.level).toBe('info');
  });

  test('should log at debug when asked', () => {
    const logger = createLogger({ debug: true });

    expect(logger.level).toBe('debug');
    expect(logger.isLevelEnabled('debug')).toBe(true);
  });
});

describe('hashCredential', () => {
  test('should return the SHA-256 hex digest', () => {
    expect(hashCredential('test-secret')).toBe('9caf06bb4436cdbfa20af9121a626bc1093c4f54b31c0fa937957856135345b6');
  });
});
