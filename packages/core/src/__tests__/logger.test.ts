import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, withCorrelationId, generateCorrelationId } from '../logger.js';

describe('createLogger', () => {
  beforeEach(() => {
    vi.stubEnv('LOG_LEVEL', 'info');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should use LOG_LEVEL', () => {
    expect(createLogger({ name: 'test-logger' }).level).toBe('info');
  });

  it('should follow a changed LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    expect(createLogger({ name: 'test-logger' }).level).toBe('warn');
  });
});

describe('withCorrelationId', () => {
  beforeEach(() => {
    vi.stubEnv('LOG_LEVEL', 'warn');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should create a child logger carrying the ID', () => {
    const child = withCorrelationId(createLogger({ name: 'parent' }), 'corr-123');
    expect(child.bindings().correlationId).toBe('corr-123');
  });

  it('should keep the parent level by default', () => {
    expect(withCorrelationId(createLogger({ name: 'parent' }), 'corr-1').level).toBe('warn');
  });

  it('should apply an explicit level to the child only', () => {
    const parent = createLogger({ name: 'parent' });
    const child = withCorrelationId(parent, 'corr-1', 'debug');

    expect(child.level).toBe('debug');
    expect(parent.level).toBe('warn');
  });
});

describe('generateCorrelationId', () => {
  it('should combine a timestamp and a random suffix', () => {
    expect(generateCorrelationId()).toMatch(/^\d+-[a-z0-9]+$/);
  });

  it('should not repeat', () => {
    const ids = new Set(Array.from({ length: 50 }, () => generateCorrelationId()));
    expect(ids.size).toBe(50);
  });
});
