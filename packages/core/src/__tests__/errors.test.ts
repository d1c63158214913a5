import { describe, it, expect } from 'vitest';
import {
  AppError,
  ValidationError,
  ConfigurationError,
  ModelUnavailableError,
  PerItemError,
} from '../errors.js';

describe('AppError', () => {
  it('should carry a message and a code', () => {
    const error = new AppError('Test error', 'TEST_CODE');

    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.name).toBe('AppError');
  });
});

describe('ValidationError', () => {
  it('should keep details', () => {
    const details = { field: 'annual_sales_qty' };
    const error = new ValidationError('Invalid', details);

    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.details).toBe(details);
  });
});

describe('ConfigurationError', () => {
  it('should record the offending key', () => {
    const error = new ConfigurationError('Bad weight', 'weightGrowthTrend');

    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.key).toBe('weightGrowthTrend');
    expect(error.name).toBe('ConfigurationError');
  });

  it('should allow no key', () => {
    expect(new ConfigurationError('Bad').key).toBeUndefined();
  });
});

describe('ModelUnavailableError', () => {
  it('should prefix the model name', () => {
    const error = new ModelUnavailableError('KMEANS', '2 items cannot form 3 clusters');

    expect(error.message).toBe('KMEANS unavailable: 2 items cannot form 3 clusters');
    expect(error.model).toBe('KMEANS');
    expect(error.code).toBe('MODEL_UNAVAILABLE');
  });
});

describe('PerItemError', () => {
  it('should prefix the item code', () => {
    const error = new PerItemError('PUMP-A', 'boom');
    expect(error.message).toBe('Item PUMP-A: boom');
    expect(error.code).toBe('PER_ITEM_ERROR');
  });

  it('should wrap an Error and keep it as the cause', () => {
    const cause = new ValidationError('negative stock');
    const error = PerItemError.from('PUMP-A', cause);

    expect(error.message).toBe('Item PUMP-A: negative stock');
    expect(error.originalError).toBe(cause);
  });

  it('should return an existing PerItemError unchanged', () => {
    const original = new PerItemError('PUMP-A', 'boom');
    expect(PerItemError.from('OTHER', original)).toBe(original);
  });

  it('should stringify non-Error values', () => {
    const error = PerItemError.from('PUMP-A', 'plain failure');
    expect(error.message).toBe('Item PUMP-A: plain failure');
    expect(error.originalError).toBeUndefined();
  });
});
