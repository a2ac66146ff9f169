import { ValidationError } from '@shared/errors/AppError';

export interface ExportArgs {
  url: string;
  /** Explicit slugs from `--attributes a,b`. */
  attributes: string[];
  standard: boolean;
  /** Minimum portion for `--common`, when given. */
  common?: number;
  out: string;
  clearCache: boolean;
  /** Cache prefix text from `--prefix`; slugified by the cache. */
  prefix?: string;
}

/** Reads the export CLI's flags from `argv` (without the node and script entries). */
export function parseExportArgs(argv: readonly string[]): ExportArgs {
  const getArg = (flag: string): string | undefined => {
    const idx = argv.indexOf(flag);
    return idx !== -1 && idx + 1 < argv.length ? argv[idx + 1] : undefined;
  };
  const hasFlag = (flag: string): boolean => argv.includes(flag);

  const url = getArg('--url');
  if (!url) throw new ValidationError('--url <search url> is required');

  const commonRaw = getArg('--common');
  let common: number | undefined;
  if (commonRaw !== undefined) {
    common = commonRaw.trim() === '' ? NaN : Number(commonRaw);
    if (Number.isNaN(common) || common < 0 || common > 1) {
      throw new ValidationError(`--common must be a number between 0 and 1, got: ${commonRaw}`);
    }
  }

  const prefix = getArg('--prefix');
  if (prefix !== undefined && prefix.trim() === '') {
    throw new ValidationError('--prefix must not be empty');
  }

  return {
    url,
    attributes: (getArg('--attributes') ?? '')
      .split(',')
      .map((slug) => slug.trim())
      .filter((slug) => slug.length > 0),
    standard: hasFlag('--standard'),
    common,
    out: getArg('--out') ?? 'oc-table.json',
    clearCache: hasFlag('--clear-cache'),
    prefix,
  };
}
