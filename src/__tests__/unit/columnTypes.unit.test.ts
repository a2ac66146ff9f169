/**
 * Unit Tests — Column Type Inference
 */
import { coerceColumn, inferColumnType, isTimestamp } from '@etl/columnTypes';

describe('isTimestamp()', () => {
  it.each([
    ['2024-03-01', true],
    ['2024-03-01T10:00:00Z', true],
    ['2024-03-01T10:00:00.250+02:00', true],
    ['24-03-01', false],
    ['March 2024', false],
    ['1999', false],
  ])('should treat %s as %s', (value, expected) => {
    expect(isTimestamp(value)).toBe(expected);
  });
});

describe('inferColumnType()', () => {
  it('should infer integer only when every value is integral and present', () => {
    expect(inferColumnType([1, 2, 3])).toBe('integer');
    expect(inferColumnType([1, null, 3])).toBe('float');
  });

  it('should infer float for any non-integral number', () => {
    expect(inferColumnType([1, 2.5])).toBe('float');
  });

  it('should infer boolean', () => {
    expect(inferColumnType([true, null, false])).toBe('boolean');
  });

  it('should infer datetime for ISO timestamp strings', () => {
    expect(inferColumnType(['2024-03-01T10:00:00Z', null])).toBe('datetime');
  });

  it('should fall back to text', () => {
    expect(inferColumnType(['a', 1])).toBe('text');
    expect(inferColumnType([null, null])).toBe('text');
    expect(inferColumnType([])).toBe('text');
  });
});

describe('coerceColumn()', () => {
  it('should fill missing booleans with false', () => {
    expect(coerceColumn('boolean', [true, null])).toEqual([true, false]);
  });

  it('should convert timestamps to dates and keep missing cells', () => {
    expect(coerceColumn('datetime', ['2024-03-01T10:00:00Z', null])).toEqual([
      new Date('2024-03-01T10:00:00Z'),
      null,
    ]);
  });

  it('should leave other columns unchanged', () => {
    expect(coerceColumn('float', [1, null])).toEqual([1, null]);
  });
});
