/**
 * List renderer tests
 */

import { describe, it, expect } from 'vitest';
import {
  renderList,
  renderNumber,
  renderString,
  renderValue,
} from '../../../src/lib/flattener/list-renderer.js';

describe('renderList', () => {
  it('should single-quote strings and separate items with comma-space', () => {
    expect(renderList(['10', '11'])).toBe("['10', '11']");
  });

  it('should render an empty list', () => {
    expect(renderList([])).toBe('[]');
  });

  it('should render scalars', () => {
    expect(renderList([1, 2.5, true, false, null])).toBe('[1, 2.5, True, False, None]');
  });

  it('should render nested lists and mappings', () => {
    expect(renderList([[1, 'a'], { k: 'v', n: [null] }])).toBe(
      "[[1, 'a'], {'k': 'v', 'n': [None]}]",
    );
  });
});

describe('renderString', () => {
  it('should switch to double quotes for strings holding only single quotes', () => {
    expect(renderString("it's")).toBe('"it\'s"');
  });

  it('should escape single quotes when both quote kinds appear', () => {
    expect(renderString(`a'b"c`)).toBe(`'a\\'b"c'`);
  });

  it('should escape backslashes and control characters', () => {
    expect(renderString('a\\b\nc\td')).toBe("'a\\\\b\\nc\\td'");
  });
});

describe('renderString control characters', () => {
  it('should escape other control characters as two-digit hex', () => {
    expect(renderString('a\x00b\x1bc\x7f')).toBe("'a\\x00b\\x1bc\\x7f'");
  });

  it('should leave printable text alone', () => {
    expect(renderString('héllo ~')).toBe("'héllo ~'");
  });
});

describe('renderNumber', () => {
  it('should pad one-digit exponents to two digits', () => {
    expect(renderNumber(1e-7)).toBe('1e-07');
    expect(renderNumber(2.5e-8)).toBe('2.5e-08');
  });

  it('should leave longer exponents and plain numbers unchanged', () => {
    expect(renderNumber(1e21)).toBe('1e+21');
    expect(renderNumber(1.5e-10)).toBe('1.5e-10');
    expect(renderNumber(0.1)).toBe('0.1');
    expect(renderNumber(-3)).toBe('-3');
  });

  it('should apply inside rendered lists', () => {
    expect(renderList([1e-7, 1e21, 0.1])).toBe('[1e-07, 1e+21, 0.1]');
  });
});

describe('renderValue', () => {
  it('should render a mapping with quoted keys', () => {
    expect(renderValue({ a: 1 })).toBe("{'a': 1}");
  });
});
