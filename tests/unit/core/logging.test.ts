import { describe, it, expect } from 'vitest';
import { parseLogLevel, PinoLoggerFactory } from '../../../src/core/logging/index.js';

describe('parseLogLevel', () => {
  it('accepts known levels case-insensitively', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('warn')).toBe('warn');
  });

  it('falls back to silent', () => {
    expect(parseLogLevel(undefined)).toBe('silent');
    expect(parseLogLevel('chatty')).toBe('silent');
  });
});

describe('PinoLoggerFactory', () => {
  it('creates component loggers at the configured level', () => {
    const factory = new PinoLoggerFactory('warn');
    const logger = factory.create('SetupSession');

    expect(factory.root.level).toBe('warn');
    expect(logger.level).toBe('warn');
    expect(logger.bindings()).toEqual({ component: 'SetupSession' });
  });
});
