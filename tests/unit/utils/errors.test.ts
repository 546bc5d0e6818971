import { describe, it, expect } from 'vitest';
import {
  FlatcolError,
  ConfigError,
  FileIOError,
  ProtocolError,
  UnsupportedTypeError,
  MissingFieldError,
  ErrorCode,
  toFlatcolError,
} from '../../../src/utils/errors.js';

describe('Errors', () => {
  it('should create FlatcolError with correct properties', () => {
    const error = new FlatcolError(ErrorCode.GENERAL_ERROR, 'test message', { detail: 'extra' });
    expect(error.message).toBe('test message');
    expect(error.code).toBe(ErrorCode.GENERAL_ERROR);
    expect(error.details).toEqual({ detail: 'extra' });
    expect(error.name).toBe('FlatcolError');
  });

  it('should create ConfigError with correct properties', () => {
    const error = new ConfigError('config error');
    expect(error.message).toBe('config error');
    expect(error.code).toBe(ErrorCode.CONFIG_ERROR);
    expect(error.name).toBe('ConfigError');
  });

  it('should create FileIOError with correct properties', () => {
    const error = new FileIOError('io error');
    expect(error.message).toBe('io error');
    expect(error.code).toBe(ErrorCode.FILE_IO_ERROR);
    expect(error.name).toBe('FileIOError');
  });

  it('should create ProtocolError with correct properties', () => {
    const error = new ProtocolError('bad message');
    expect(error.code).toBe(ErrorCode.PROTOCOL_ERROR);
    expect(error.name).toBe('ProtocolError');
  });

  it('should carry field and declared types on UnsupportedTypeError', () => {
    const error = new UnsupportedTypeError('created_at', ['null', 'date-time']);
    expect(error).toBeInstanceOf(FlatcolError);
    expect(error.name).toBe('UnsupportedTypeError');
    expect(error.field).toBe('created_at');
    expect(error.declaredTypes).toEqual(['null', 'date-time']);
    expect(error.message).toBe(
      'Data types ["null","date-time"] for field created_at are not supported',
    );
  });

  it('should carry the missing key on MissingFieldError', () => {
    const error = new MissingFieldError('a__b');
    expect(error).toBeInstanceOf(FlatcolError);
    expect(error.name).toBe('MissingFieldError');
    expect(error.field).toBe('a__b');
    expect(error.details).toEqual({ field: 'a__b' });
  });

  it('should format error for CLI response', () => {
    const error = new FlatcolError(ErrorCode.GENERAL_ERROR, 'test message', { detail: 'extra' });
    const response = error.toResponse('schema');
    expect(response).toEqual({
      status: 'error',
      phase: 'schema',
      error: {
        code: ErrorCode.GENERAL_ERROR,
        message: 'test message',
        details: { detail: 'extra' },
      },
    });
  });

  it('should include the cause in the CLI response', () => {
    const error = new ConfigError('wrapped', undefined, { cause: new Error('inner') });
    expect(error.toResponse('flatten').error).toEqual({
      code: ErrorCode.CONFIG_ERROR,
      message: 'wrapped',
      cause: 'Error: inner',
    });
  });

  it('should wrap foreign errors and keep flatcol errors', () => {
    const own = new MissingFieldError('x');
    expect(toFlatcolError(own)).toBe(own);

    const wrapped = toFlatcolError(new TypeError('boom'));
    expect(wrapped.code).toBe(ErrorCode.GENERAL_ERROR);
    expect(wrapped.message).toBe('boom');

    expect(toFlatcolError('plain').message).toBe('plain');
  });
});
