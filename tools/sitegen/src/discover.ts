/**
 * discover.ts — Find and parse the content files of every collection.
 *
 *   {content_dir}/<collection dir>/*.md
 *
 * Files are read in name order so "source order" is stable across machines.
 * A missing collection directory is an empty collection, not an error.
 */

import { existsSync, readFileSync, readdirSync, statSync } from 'fs';
import { join } from 'path';

import { parseContentItem } from './frontmatter.js';
import type { Layout } from './layouts.js';
import type { Collection, SiteConfig } from './types.js';

export function listContentFiles(dir: string): string[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) return [];
  return readdirSync(dir)
    .filter((f) => f.endsWith('.md') && !f.startsWith('.'))
    .sort()
    .map((f) => join(dir, f))
    .filter((f) => statSync(f).isFile());
}

export function discoverCollections(
  cfg: SiteConfig,
  layouts: ReadonlyMap<string, Layout>,
): Collection[] {
  return cfg.collections.map((c) => {
    const items = listContentFiles(join(cfg.content_dir, c.dir))
      .map((file) => parseContentItem(readFileSync(file, 'utf-8'), file, { collection: c.name, layouts }))
      .filter((item) => cfg.include_drafts || !item.draft);
    return { ...c, items };
  });
}
