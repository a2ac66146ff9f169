/**
 * Unit Tests — FileResponseCache
 *
 * Runs against a fresh temporary directory per test. Every unreadable entry
 * (absent, malformed, literal null) must come back as a miss, never throw.
 */
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { createClientOptions } from '@core/clientOptions';
import { FileResponseCache } from '@infrastructure/cache/FileResponseCache';
import { slugify } from '@shared/slug';

import { silentLogger } from '../helpers/fakes';

describe('FileResponseCache', () => {
  let dir: string;
  let cache: FileResponseCache;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'oc-cache-'));
    cache = new FileResponseCache(
      createClientOptions({ cacheDir: dir, cachePrefix: '2024-01-01' }),
      silentLogger,
    );
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('read() / write()', () => {
    it('should round-trip a payload', async () => {
      const payload = { totalResults: 2, 'oc-api:has-results': [{ label: 'Bone 1' }] };

      await cache.write('2024-01-01-abc.json', payload);

      expect(await cache.read('2024-01-01-abc.json')).toEqual(payload);
    });

    it('should pretty-print with a 4-space indent', async () => {
      await cache.write('entry.json', { a: 1 });

      const text = await fs.readFile(path.join(dir, 'entry.json'), 'utf-8');
      expect(text).toBe('{\n    "a": 1\n}');
    });

    it('should create the cache directory on first write', async () => {
      const nested = path.join(dir, 'nested', 'cache');
      const nestedCache = new FileResponseCache(
        createClientOptions({ cacheDir: nested, cachePrefix: 'p' }),
        silentLogger,
      );

      await nestedCache.write('p-1.json', [1]);

      expect(await nestedCache.read('p-1.json')).toEqual([1]);
    });

    it('should report a missing file as a miss', async () => {
      expect(await cache.read('absent.json')).toBeUndefined();
    });

    it('should report malformed JSON as a miss', async () => {
      await fs.writeFile(path.join(dir, 'bad.json'), 'not json{', 'utf-8');

      expect(await cache.read('bad.json')).toBeUndefined();
    });

    it('should report a literal null as a miss', async () => {
      await fs.writeFile(path.join(dir, 'null.json'), 'null', 'utf-8');

      expect(await cache.read('null.json')).toBeUndefined();
    });

    it('should read an entry that starts with a UTF-8 byte order mark', async () => {
      await fs.writeFile(path.join(dir, 'bom.json'), '\uFEFF{"a":1}', 'utf-8');

      expect(await cache.read('bom.json')).toEqual({ a: 1 });
    });

    it('should report bytes that are not valid UTF-8 as a miss', async () => {
      const bytes = Buffer.concat([
        Buffer.from('{"a":"', 'utf-8'),
        Buffer.from([0xff, 0xfe]),
        Buffer.from('"}', 'utf-8'),
      ]);
      await fs.writeFile(path.join(dir, 'latin.json'), bytes);

      expect(await cache.read('latin.json')).toBeUndefined();
    });
  });

  describe('clear()', () => {
    beforeEach(async () => {
      await fs.writeFile(path.join(dir, '2024-01-01-current.json'), '{}', 'utf-8');
      await fs.writeFile(path.join(dir, '2023-12-31-stale.json'), '{}', 'utf-8');
      await fs.mkdir(path.join(dir, '2023-archive'));
    });

    it('should delete entries from other prefixes when keeping the prefix', async () => {
      const deleted = await cache.clear(true);

      expect(deleted).toBe(1);
      expect((await fs.readdir(dir)).sort()).toEqual(['2023-archive', '2024-01-01-current.json']);
    });

    it('should delete the active prefix entries otherwise', async () => {
      const deleted = await cache.clear(false);

      expect(deleted).toBe(1);
      expect((await fs.readdir(dir)).sort()).toEqual(['2023-12-31-stale.json', '2023-archive']);
    });

    it('should return 0 when the cache directory does not exist', async () => {
      const missing = new FileResponseCache(
        createClientOptions({ cacheDir: path.join(dir, 'missing'), cachePrefix: 'p' }),
        silentLogger,
      );

      expect(await missing.clear(true)).toBe(0);
    });
  });

  describe('setPrefix()', () => {
    it('should slugify the given text', () => {
      cache.setPrefix('Test Project 7!');

      expect(cache.prefix).toBe('test-project-7');
    });
  });
});

describe('slugify()', () => {
  it.each([
    ['Çatalhöyük Area 4', 'catalhoyuk-area-4'],
    ['  Trench / Locus  ', 'trench-locus'],
    ['***', 'untitled'],
  ])('should turn %p into %p', (text, expected) => {
    expect(slugify(text)).toBe(expected);
  });
});
