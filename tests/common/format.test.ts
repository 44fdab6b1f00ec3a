import { describe, it, expect } from 'vitest';
import {
  formatString,
  hasTopLevelOperator,
  isWrapped,
  jsonDumps,
  wrap,
} from '../../src/common/format';

describe('expression formatting (FORMAT)', () => {
  it('should only treat matching outer brackets as wrapped', () => {
    expect(isWrapped('(a + b)', '(')).toBe(true);
    expect(isWrapped('(a) + (b)', '(')).toBe(false);
    expect(wrap('(a) + (b)', '(')).toBe('((a) + (b))');
    expect(wrap('(a + b)', '(')).toBe('(a + b)');
    expect(wrap('x', '{', { num: 2 })).toBe('{{x}}');
  });

  it('should detect operators outside brackets and strings', () => {
    expect(hasTopLevelOperator('a + b')).toBe(true);
    expect(hasTopLevelOperator('(a + b)')).toBe(false);
    expect(hasTopLevelOperator('"a + b"')).toBe(false);
    expect(hasTopLevelOperator('Math.floor(a / b)')).toBe(false);
    expect(hasTopLevelOperator('-2')).toBe(false);
  });

  it('should render raw strings as template literals', () => {
    expect(formatString('hi')).toBe('{`hi`}');
    expect(formatString('a`b')).toBe('{`a\\`b`}');
  });

  it('should return null for values without a JSON form', () => {
    expect(jsonDumps({ a: [1] })).toBe('{"a":[1]}');
    expect(jsonDumps(undefined)).toBeNull();
    expect(jsonDumps(10n)).toBeNull();
  });
});
