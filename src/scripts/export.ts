/**
 * Export CLI — Search URL → JSON table file
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run export -- --url <search url> [--attributes a,b] [--standard]
 *                     [--common <portion>] [--out table.json] [--clear-cache]
 *                     [--prefix <text>]
 *
 * With --standard and/or --common the attribute slugs are discovered from the
 * search's facets first and merged with any --attributes given. The table is
 * then built through the same services the HTTP API uses and written as
 * `{ columns, rows }`. --prefix replaces the dated cache prefix with a slug of
 * the text, so a project's responses can be kept and cleared together.
 */
import type { ApiClient } from '@application/services/ApiClient';
import type { FacetAttributeService } from '@application/services/FacetAttributeService';
import type { TableService } from '@application/services/TableService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { parseExportArgs, type ExportArgs } from './exportArgs';
import fs from 'fs/promises';
import path from 'path';

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

async function discoverSlugs(args: ExportArgs): Promise<string[]> {
  const facets = container.resolve<FacetAttributeService>(TOKENS.FacetAttributeService);
  const slugs = [...args.attributes];

  if (args.standard) {
    const found = await facets.standardAttributes(args.url);
    if (found === null) throw new Error(`Could not fetch facets from: ${args.url}`);
    slugs.push(...found.map(({ slug }) => slug));
  }

  if (args.common !== undefined) {
    const found = await facets.commonAttributes(args.url, args.common);
    if (found === null) throw new Error(`Could not fetch facets from: ${args.url}`);
    slugs.push(...found.map(({ slug }) => slug));
  }

  return [...new Set(slugs)];
}

// Main

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const log = console.log;

  const args = parseExportArgs(process.argv.slice(2));
  const outFile = path.resolve(args.out);
  const api = container.resolve<ApiClient>(TOKENS.ApiClient);

  if (args.prefix !== undefined) {
    api.setCachePrefix(args.prefix);
    log(`  Cache prefix: ${api.cachePrefix}`);
  }

  if (args.clearCache) {
    const deleted = await api.clearCache(true);
    log(`  Cleared ${deleted} stale cache file(s).`);
  }

  const startTime = Date.now();
  const slugs = await discoverSlugs(args);
  log(`  Search:     ${args.url}`);
  log(`  Attributes: ${slugs.length > 0 ? slugs.join(', ') : '(none)'}`);
  log('');

  const tables = container.resolve<TableService>(TOKENS.TableService);
  const table = await tables.buildTable(args.url, slugs);
  await fs.writeFile(
    outFile,
    JSON.stringify({ columns: table.columns, rows: table.rows }, null, 2),
    'utf8',
  );

  log('  ✓ Export complete');
  log(`    Rows:     ${table.rows.length}`);
  log(`    Columns:  ${table.columns.length}`);
  log(`    Duration: ${formatDuration(Date.now() - startTime)}`);
  log(`    Output:   ${outFile}`);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Export failed:', err);
  process.exit(1);
});
