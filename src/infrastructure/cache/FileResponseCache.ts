/**
 * File Response Cache — One JSON File per API Request
 * Layer: Infrastructure
 * Pattern: Repository-style store (implements IResponseCache)
 *
 * The Open Context API is slow, so every payload is kept on the local file
 * system under a name from cacheKey.ts. Reads never throw: a missing file,
 * bad encoding or malformed JSON is a CacheReadFailure, logged at debug and
 * reported as a miss so the caller falls back to a live fetch.
 *
 * Writes pretty-print with a 4-space indent and overwrite in place. Only one
 * writer per directory is assumed.
 */
import fs from 'node:fs/promises';
import path from 'node:path';
import { TextDecoder } from 'node:util';

import type { ClientOptions } from '@core/clientOptions';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { IResponseCache } from '@domain/interfaces/IResponseCache';
import { CacheReadFailure } from '@shared/errors/AppError';
import { slugify } from '@shared/slug';
import { inject, injectable } from 'tsyringe';

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: false });

@injectable()
export class FileResponseCache implements IResponseCache {
  private readonly dir: string;
  private currentPrefix: string;

  constructor(
    @inject(TOKENS.ClientOptions) options: ClientOptions,
    @inject(TOKENS.Logger) private log: Logger,
  ) {
    this.dir = path.resolve(options.cacheDir);
    this.currentPrefix = options.cachePrefix;
  }

  get prefix(): string {
    return this.currentPrefix;
  }

  get directory(): string {
    return this.dir;
  }

  setPrefix(text: string): void {
    this.currentPrefix = slugify(text);
  }

  async read(name: string): Promise<unknown> {
    try {
      return await this.readOrFail(name);
    } catch (err) {
      const failure =
        err instanceof CacheReadFailure
          ? err
          : new CacheReadFailure(name, err instanceof Error ? err.message : String(err));
      this.log.debug({ file: failure.fileName, reason: failure.message }, 'Cache miss');
      return undefined;
    }
  }

  async write(name: string, payload: unknown): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    const json = JSON.stringify(payload, null, 4);
    await fs.writeFile(path.join(this.dir, name), json, 'utf-8');
    this.log.debug({ file: name }, 'Cached API response');
  }

  async clear(keepPrefix: boolean): Promise<number> {
    const entries = await fs.readdir(this.dir, { withFileTypes: true }).catch((err: unknown) => {
      if (isMissingPath(err)) return [];
      throw err;
    });

    let deleted = 0;
    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const matchesPrefix = entry.name.startsWith(this.currentPrefix);
      if (matchesPrefix === keepPrefix) continue;
      await fs.unlink(path.join(this.dir, entry.name));
      deleted++;
    }

    this.log.info({ deleted, keepPrefix, prefix: this.currentPrefix }, 'Cleared API cache');
    return deleted;
  }

  private async readOrFail(name: string): Promise<unknown> {
    const bytes = await fs.readFile(path.join(this.dir, name));
    let text: string;
    try {
      // Strict decode (a leading BOM is dropped); invalid bytes are a miss, never U+FFFD.
      text = utf8.decode(bytes);
    } catch {
      throw new CacheReadFailure(name, 'invalid UTF-8');
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new CacheReadFailure(name, err instanceof Error ? err.message : 'malformed JSON');
    }
    if (parsed === null) throw new CacheReadFailure(name, 'empty payload');
    return parsed;
  }
}

// fs errors are checked by shape: under a separate VM context (Jest) they are
// not instances of this realm's Error.
function isMissingPath(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
