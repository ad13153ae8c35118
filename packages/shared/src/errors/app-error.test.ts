import { describe, it, expect } from 'vitest';
import { AppError, AppErrorSchema, toError } from './app-error.ts';

describe('AppError', () => {
  describe('create()', () => {
    it('creates an error with default severity', () => {
      const error = AppError.create('ETL_LAYOUT_INVALID', 'Table layout does not match');
      expect(error.code).toBe('ETL_LAYOUT_INVALID');
      expect(error.message).toBe('Table layout does not match');
      expect(error.severity).toBe('error');
      expect(error.context).toEqual({});
      expect(error.timestamp).toBeDefined();
    });

    it('creates an error with context', () => {
      const error = AppError.create('ETL_SHEET_NOT_FOUND', 'Sheet missing', 'error', {
        sheetName: 'Marketing',
      });
      expect(error.context).toEqual({ sheetName: 'Marketing' });
    });

    it('preserves cause message', () => {
      const error = AppError.create('WRAPPED', 'Wrapper', 'error', undefined, new Error('original error'));
      expect(error.cause).toBe('original error');
    });
  });

  describe('fromCause()', () => {
    it('wraps thrown errors', () => {
      const error = AppError.fromCause('ETL_SOURCE_UNREADABLE', 'Cannot read', new Error('zip end header'), {
        filePath: 'in.xlsx',
      });
      expect(error.severity).toBe('error');
      expect(error.cause).toBe('zip end header');
      expect(error.context).toEqual({ filePath: 'in.xlsx' });
    });

    it('wraps non-error throwables', () => {
      const error = AppError.fromCause('X', 'Thrown string', 'boom');
      expect(error.cause).toBe('boom');
    });
  });

  describe('factory methods', () => {
    it('fatal() sets severity to fatal', () => {
      expect(AppError.fatal('CRASH', 'System crashed').severity).toBe('fatal');
    });

    it('warning() sets severity to warning', () => {
      expect(AppError.warning('EMPTY_PERIOD', 'Period without data').severity).toBe('warning');
    });

    it('info() sets severity to info', () => {
      expect(AppError.info('CACHE_HIT', 'Dataset served from cache').severity).toBe('info');
    });
  });

  describe('serialization', () => {
    it('toDTO() validates against the schema and fromDTO() restores it', () => {
      const original = AppError.create('ROUND_TRIP', 'Test round trip', 'warning', { key: 'value' }, new Error('inner'));
      const dto = original.toDTO();

      expect(AppErrorSchema.safeParse(dto).success).toBe(true);

      const restored = AppError.fromDTO(dto);
      expect(restored.code).toBe('ROUND_TRIP');
      expect(restored.severity).toBe('warning');
      expect(restored.context).toEqual({ key: 'value' });
      expect(restored.timestamp).toBe(original.timestamp);
      expect(restored.cause).toBe('inner');
    });
  });

  describe('toString()', () => {
    it('formats error as string', () => {
      const error = AppError.create('MY_CODE', 'Something happened', 'error');
      expect(error.toString()).toBe('[ERROR] MY_CODE: Something happened');
    });

    it('appends the cause when present', () => {
      const error = AppError.create('MY_CODE', 'Something happened', 'fatal', undefined, new Error('disk full'));
      expect(error.toString()).toBe('[FATAL] MY_CODE: Something happened (cause: disk full)');
    });
  });
});

describe('toError', () => {
  it('keeps Error instances', () => {
    const cause = new Error('kept');
    expect(toError(cause)).toBe(cause);
  });

  it('wraps other values', () => {
    expect(toError(42).message).toBe('42');
  });
});
