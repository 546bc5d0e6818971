/**
 * Type resolver tests
 */

import { describe, it, expect } from 'vitest';
import {
  FIELD_TYPE_TO_STORAGE,
  resolveColumn,
  resolveField,
} from '../../../src/lib/resolver/type-resolver.js';
import { ErrorCode, UnsupportedTypeError } from '../../../src/utils/errors.js';

describe('resolveField', () => {
  it('should resolve a nullable integer', () => {
    expect(resolveField('x', ['null', 'integer'])).toEqual({ type: 'int64', nullable: true });
  });

  it('should resolve a single string token', () => {
    expect(resolveField('x', 'string')).toEqual({ type: 'string', nullable: false });
  });

  it('should default an empty declaration to string', () => {
    expect(resolveField('x', [])).toEqual({ type: 'string', nullable: false });
    expect(resolveField('x', null)).toEqual({ type: 'string', nullable: false });
    expect(resolveField('x', undefined)).toEqual({ type: 'string', nullable: false });
  });

  it('should resolve arrays to string', () => {
    expect(resolveField('x', ['null', 'array'])).toEqual({ type: 'string', nullable: true });
  });

  it('should resolve boolean and number', () => {
    expect(resolveField('x', 'boolean')).toEqual({ type: 'boolean', nullable: false });
    expect(resolveField('x', ['number', 'null'])).toEqual({ type: 'float64', nullable: true });
  });

  it('should treat a lone null token as a nullable string', () => {
    expect(resolveField('x', ['null'])).toEqual({ type: 'string', nullable: true });
  });

  it('should match tokens case-insensitively', () => {
    expect(resolveField('x', ['NULL', 'Integer'])).toEqual({ type: 'int64', nullable: true });
  });

  it('should collapse duplicate tokens', () => {
    expect(resolveField('x', ['integer', 'INTEGER'])).toEqual({ type: 'int64', nullable: false });
  });

  it('should pick the widest of several concrete tokens', () => {
    expect(resolveField('x', ['integer', 'number'])).toEqual({ type: 'float64', nullable: false });
    expect(resolveField('x', ['null', 'boolean', 'string'])).toEqual({
      type: 'string',
      nullable: true,
    });
    expect(resolveField('x', ['boolean', 'integer'])).toEqual({ type: 'int64', nullable: false });
  });

  it('should give the same result regardless of token order', () => {
    expect(resolveField('x', ['number', 'integer'])).toEqual(
      resolveField('x', ['integer', 'number']),
    );
  });

  it('should reject an unsupported type', () => {
    let caught: unknown;
    try {
      resolveField('x', ['timestamp']);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnsupportedTypeError);
    if (caught instanceof UnsupportedTypeError) {
      expect(caught.field).toBe('x');
      expect(caught.declaredTypes).toEqual(['timestamp']);
      expect(caught.code).toBe(ErrorCode.UNSUPPORTED_TYPE);
      expect(caught.details).toEqual({ field: 'x', declaredTypes: ['timestamp'] });
      expect(caught.message).toBe('Data types ["timestamp"] for field x are not supported');
    }
  });

  it('should reject an unsupported token mixed with supported ones', () => {
    expect(() => resolveField('x', ['null', 'string', 'date'])).toThrow(UnsupportedTypeError);
  });

  it('should reject object, which never reaches a leaf column', () => {
    expect(() => resolveField('meta', ['null', 'object'])).toThrow(UnsupportedTypeError);
  });
});

describe('resolveColumn', () => {
  it('should attach the field name', () => {
    expect(resolveColumn('id', ['null', 'integer'])).toEqual({
      name: 'id',
      type: 'int64',
      nullable: true,
    });
  });
});

describe('FIELD_TYPE_TO_STORAGE', () => {
  it('should cover exactly the supported tokens', () => {
    expect(FIELD_TYPE_TO_STORAGE).toEqual({
      BOOLEAN: 'boolean',
      STRING: 'string',
      ARRAY: 'string',
      '': 'string',
      INTEGER: 'int64',
      NUMBER: 'float64',
    });
  });
});
