/**
 * Unit Tests — parseExportArgs()
 */
import { parseExportArgs } from '../../scripts/exportArgs';
import { ValidationError } from '@shared/errors/AppError';

const URL = 'https://opencontext.org/query/?type=subjects';

describe('parseExportArgs()', () => {
  it('should apply defaults when only --url is given', () => {
    expect(parseExportArgs(['--url', URL])).toEqual({
      url: URL,
      attributes: [],
      standard: false,
      common: undefined,
      out: 'oc-table.json',
      clearCache: false,
      prefix: undefined,
    });
  });

  it('should read every flag', () => {
    const args = parseExportArgs([
      '--url', URL,
      '--attributes', ' proj-a-phase, ,proj-a-length',
      '--standard',
      '--common', '0.25',
      '--out', 'bones.json',
      '--clear-cache',
      '--prefix', 'Test Project / Area B',
    ]);

    expect(args).toEqual({
      url: URL,
      attributes: ['proj-a-phase', 'proj-a-length'],
      standard: true,
      common: 0.25,
      out: 'bones.json',
      clearCache: true,
      prefix: 'Test Project / Area B',
    });
  });

  it('should require --url', () => {
    expect(() => parseExportArgs(['--standard'])).toThrow(ValidationError);
  });

  it.each(['1.5', '-0.1', 'abc', ''])('should reject --common %p', (value) => {
    expect(() => parseExportArgs(['--url', URL, '--common', value])).toThrow(
      `--common must be a number between 0 and 1, got: ${value}`,
    );
  });

  it('should reject an empty --prefix', () => {
    expect(() => parseExportArgs(['--url', URL, '--prefix', '  '])).toThrow('--prefix must not be empty');
  });
});
