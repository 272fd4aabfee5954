import { describe, it, expect } from 'vitest';
import { AppError, ValidationError, RenderError, SaveError, toAppError } from './errors';

describe('errors', () => {
  it('ERR-001: AppError carries message and optional code', () => {
    const err = new AppError('boom', 'X');
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe('boom');
    expect(err.code).toBe('X');
    expect(err.name).toBe('AppError');
    expect(new AppError('plain').code).toBeUndefined();
  });

  it('ERR-002: ValidationError uses VALIDATION_ERROR', () => {
    const err = new ValidationError('bad range');
    expect(err).toBeInstanceOf(AppError);
    expect(err.code).toBe('VALIDATION_ERROR');
    expect(err.name).toBe('ValidationError');
    expect(err.message).toBe('bad range');
  });

  it('ERR-003: RenderError uses RENDER_ERROR', () => {
    const err = new RenderError('out of memory');
    expect(err.code).toBe('RENDER_ERROR');
    expect(err.name).toBe('RenderError');
  });

  it('ERR-004: SaveError names the path', () => {
    const err = new SaveError('out.exr', 'disk full');
    expect(err.code).toBe('SAVE_ERROR');
    expect(err.message).toBe('Failed to save out.exr: disk full');
  });

  describe('toAppError', () => {
    const wrap = (detail: string) => new RenderError(detail);

    it('ERR-005: returns AppError instances unchanged', () => {
      const original = new ValidationError('nope');
      expect(toAppError(original, wrap)).toBe(original);
    });

    it('ERR-006: wraps plain errors using their message', () => {
      const result = toAppError(new TypeError('undefined is not a function'), wrap);
      expect(result).toBeInstanceOf(RenderError);
      expect(result.message).toBe('undefined is not a function');
    });

    it('ERR-007: stringifies non-error values', () => {
      expect(toAppError(42, wrap).message).toBe('42');
    });
  });
});
