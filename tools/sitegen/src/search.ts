/**
 * search.ts — Machine-readable companions to the HTML tree.
 *
 *   search_index.json   Fuse.js-compatible list of items
 *   site_index.json     collections → items, plus the tag list
 */

import { href } from './html.js';
import { stripMarkup } from './markdown.js';
import type { PathOf } from './listing.js';
import type { Collection, SearchEntry, SiteConfig } from './types.js';

const EXCERPT_LENGTH = 200;

export function buildSearchIndex(collections: Collection[], pathOf: PathOf, cfg: SiteConfig): SearchEntry[] {
  return collections.flatMap((c) =>
    c.items.map((item) => ({
      id: item.id,
      title: item.title,
      tags: item.tags,
      type: c.name,
      url: href(cfg, pathOf(item)),
      excerpt: stripMarkup(item.body).slice(0, EXCERPT_LENGTH),
    })),
  );
}

export interface SiteIndexFile {
  title: string;
  collections: Array<{
    name: string;
    title: string;
    url: string | null;
    items: Array<{ id: string; title: string; url: string; tags: string[] }>;
  }>;
  tags: string[];
}

export function buildSiteIndex(
  collections: Collection[],
  tags: string[],
  pathOf: PathOf,
  cfg: SiteConfig,
): SiteIndexFile {
  return {
    title: cfg.title,
    collections: collections.map((c) => ({
      name: c.name,
      title: c.title,
      url: c.listing ? href(cfg, c.path) : null,
      items: c.items.map((i) => ({ id: i.id, title: i.title, url: href(cfg, pathOf(i)), tags: i.tags })),
    })),
    tags,
  };
}
