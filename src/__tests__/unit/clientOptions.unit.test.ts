/**
 * Unit Tests — createClientOptions()
 */
import { createClientOptions, datePrefix } from '@core/clientOptions';
import { ConfigurationError } from '@shared/errors/AppError';

describe('datePrefix()', () => {
  it('should format the local date as YYYY-MM-DD', () => {
    expect(datePrefix(new Date(2024, 0, 5))).toBe('2024-01-05');
  });
});

describe('createClientOptions()', () => {
  it('should apply defaults and date the cache prefix', () => {
    const options = createClientOptions({}, new Date(2024, 10, 30));

    expect(options.cachePrefix).toBe('2024-11-30');
    expect(options.recsPerRequest).toBe(200);
    expect(options.pacingMs).toBe(250);
    expect(options.responseTypes).toEqual(['metadata', 'uri-meta']);
    expect(options.flattenAttributes).toBe(false);
    expect(options.commonMinPortion).toBe(0.2);
    expect(options.multiValue.numberPolicy).toEqual({ kind: 'first' });
    expect(options.multiValue.nonNumberPolicy).toEqual({ kind: 'concat', delimiter: '; ' });
  });

  it('should keep an explicit cache prefix', () => {
    expect(createClientOptions({ cachePrefix: 'project-x' }).cachePrefix).toBe('project-x');
  });

  it('should slugify a configured cache prefix', () => {
    expect(createClientOptions({ cachePrefix: 'Test Project / Area B' }).cachePrefix).toBe(
      'test-project-area-b',
    );
  });

  it('should be frozen', () => {
    const options = createClientOptions();

    expect(Object.isFrozen(options)).toBe(true);
    expect(Object.isFrozen(options.multiValue)).toBe(true);
  });

  it('should include the fusion character override by default', () => {
    const { overrides } = createClientOptions().multiValue;

    expect(overrides.get('Has fusion character')).toEqual({ kind: 'column_val' });
  });

  it('should let configured overrides replace the defaults', () => {
    const { overrides } = createClientOptions({
      overrides: { 'Has fusion character': 'first', material: 'json' },
    }).multiValue;

    expect(overrides.get('Has fusion character')).toEqual({ kind: 'first' });
    expect(overrides.get('material')).toEqual({ kind: 'json' });
  });

  it('should pass the delimiter to every concat policy', () => {
    const { multiValue } = createClientOptions({ delimiter: ' | ', overrides: { period: 'concat' } });

    expect(multiValue.nonNumberPolicy).toEqual({ kind: 'concat', delimiter: ' | ' });
    expect(multiValue.overrides.get('period')).toEqual({ kind: 'concat', delimiter: ' | ' });
  });

  it('should fail fast on an unknown policy name', () => {
    expect(() => createClientOptions({ numberPolicy: 'average' })).toThrow(ConfigurationError);
  });
});
