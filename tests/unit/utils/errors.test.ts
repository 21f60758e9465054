import { describe, it, expect } from 'vitest';
import {
  SeedsmithError,
  ConfigError,
  FileIOError,
  SchemaLoadError,
  IntrospectionError,
  GenerationError,
  ErrorCode,
  errorMessage,
} from '../../../src/utils/errors.js';

describe('Errors', () => {
  it('should create SeedsmithError with correct properties', () => {
    const error = new SeedsmithError(ErrorCode.GENERAL_ERROR, 'test message', { detail: 'extra' });
    expect(error.message).toBe('test message');
    expect(error.code).toBe(ErrorCode.GENERAL_ERROR);
    expect(error.details).toEqual({ detail: 'extra' });
    expect(error.name).toBe('SeedsmithError');
  });

  it.each([
    [new ConfigError('m'), ErrorCode.CONFIG_ERROR, 'ConfigError'],
    [new FileIOError('m'), ErrorCode.FILE_IO_ERROR, 'FileIOError'],
    [new SchemaLoadError('m'), ErrorCode.SCHEMA_LOAD_ERROR, 'SchemaLoadError'],
    [new IntrospectionError('m'), ErrorCode.INTROSPECTION_ERROR, 'IntrospectionError'],
    [new GenerationError('m'), ErrorCode.GENERATION_ERROR, 'GenerationError'],
  ])('should give %s its code and name', (error, code, name) => {
    expect(error).toBeInstanceOf(SeedsmithError);
    expect(error.code).toBe(code);
    expect(error.name).toBe(name);
  });

  it('should keep the cause', () => {
    const cause = new Error('disk full');
    const error = new FileIOError('write failed', undefined, { cause });
    expect(error.cause).toBe(cause);
  });

  it('should format error for CLI response', () => {
    const error = new SeedsmithError(ErrorCode.GENERAL_ERROR, 'test message', { detail: 'extra' });
    const response = error.toResponse('clone');
    expect(response).toEqual({
      status: 'error',
      phase: 'clone',
      error: {
        code: ErrorCode.GENERAL_ERROR,
        message: 'test message',
        details: { detail: 'extra' },
      },
    });
  });

  it('should include the cause in the CLI response', () => {
    const error = new SchemaLoadError('bad schema', undefined, { cause: new Error('unexpected token') });
    expect(error.toResponse('clone').error).toEqual({
      code: ErrorCode.SCHEMA_LOAD_ERROR,
      message: 'bad schema',
      cause: 'Error: unexpected token',
    });
  });

  it('should extract messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
