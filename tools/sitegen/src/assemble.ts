/**
 * assemble.ts — One linear build pass: discover → render → check → write.
 *
 * Every page is rendered in memory first. Duplicate output files and
 * dangling internal links are detected before anything touches the disk,
 * so a failed build leaves the output directory as it was.
 *
 * Output layout:
 *   {out_dir}/index.html                      ← home
 *   {out_dir}/<collection>/index.html         ← collection listing
 *   {out_dir}/<collection>/<slug>/index.html  ← item (or its permalink)
 *   {out_dir}/tags/index.html                 ← tag overview
 *   {out_dir}/tags/<tag>/index.html
 *   {out_dir}/search_index.json
 *   {out_dir}/site_index.json
 *   {out_dir}/build-manifest.json
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';

import { discoverCollections } from './discover.js';
import { BuildError } from './errors.js';
import { TAGS_PATH, buildNav, tagPath, type RenderContext } from './html.js';
import { createLayoutRegistry, renderItem, type Layout } from './layouts.js';
import { checkLinks } from './links.js';
import {
  type PathOf,
  buildTagIndex,
  renderCollectionListing,
  renderHome,
  renderTagPage,
  renderTagsOverview,
} from './listing.js';
import { slugify } from './markdown.js';
import { itemPath, pathToFile } from './paths.js';
import { buildSearchIndex, buildSiteIndex } from './search.js';
import type { Collection, ContentItem, Page, SiteConfig } from './types.js';

export type BuildLogger = Pick<Console, 'log' | 'warn'>;

export interface BuildOptions {
  /** Defaults to the built-in layouts. */
  layouts?: ReadonlyMap<string, Layout>;
  logger?: BuildLogger;
  /** false = render and check only, write nothing */
  write?: boolean;
  /** Clock for build-manifest.json */
  now?: () => Date;
}

export interface BuildResult {
  collections: Collection[];
  pages: Page[];
  tags: string[];
  /** Output path of every item */
  paths: ReadonlyMap<ContentItem, string>;
}

function write(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content, 'utf-8');
}

function pathLookup(paths: ReadonlyMap<ContentItem, string>): PathOf {
  return (item) => {
    const p = paths.get(item);
    if (p === undefined) throw new BuildError(`${item.source}: item is not part of any collection`, item.source);
    return p;
  };
}

/** Collects pages, refusing a second page for an output file. */
class PageSet {
  private readonly byFile = new Map<string, Page>();

  add(page: Page): void {
    const existing = this.byFile.get(page.file);
    if (existing) {
      const a = existing.source ?? `${existing.kind} page ${existing.path}`;
      const b = page.source ?? `${page.kind} page ${page.path}`;
      throw new BuildError(
        `duplicate output path ${page.path} (${page.file}): produced by both ${a} and ${b}`,
        page.source,
        page.path,
      );
    }
    this.byFile.set(page.file, page);
  }

  toArray(): Page[] {
    return [...this.byFile.values()];
  }
}

export function renderSite(
  cfg: SiteConfig,
  collections: Collection[],
  layouts: ReadonlyMap<string, Layout>,
  logger: BuildLogger = console,
): BuildResult {
  const ctx: RenderContext = { cfg, nav: buildNav(collections) };
  const paths = new Map<ContentItem, string>();
  for (const c of collections) {
    for (const item of c.items) paths.set(item, itemPath(item, c));
  }
  const pathOf = pathLookup(paths);

  const pages = new PageSet();

  // ── 1. Items ────────────────────────────────────────────────────────────────
  for (const c of collections) {
    for (const item of c.items) {
      const path = pathOf(item);
      const html = renderItem(item, layouts, { ...ctx, collection: c, path });
      pages.add({ path, file: pathToFile(path), kind: 'item', title: item.title, html, source: item.source });
      logger.log(`  [ok] ${item.source}`);
    }
  }

  // ── 2. Collection listings (need every item of the collection) ──────────────
  for (const c of collections) {
    if (!c.listing) continue;
    if (!c.items.length) logger.warn(`[sitegen] Collection "${c.name}" is empty`);
    pages.add({
      path: c.path,
      file: pathToFile(c.path),
      kind: 'listing',
      title: c.title,
      html: renderCollectionListing(c, pathOf, ctx),
    });
  }

  // ── 3. Tag indexes ──────────────────────────────────────────────────────────
  const allItems = collections.flatMap((c) => c.items);
  const tagIndex = buildTagIndex(allItems);
  for (const [tag, members] of tagIndex) {
    if (!slugify(tag)) {
      const first = members[0];
      throw new BuildError(`${first?.source ?? 'tags'}: tag "${tag}" has no usable characters for a URL`, first?.source);
    }
    const path = tagPath(tag);
    pages.add({ path, file: pathToFile(path), kind: 'tag', title: tag, html: renderTagPage(tag, members, pathOf, ctx) });
  }
  pages.add({
    path: TAGS_PATH,
    file: pathToFile(TAGS_PATH),
    kind: 'tags',
    title: 'Tags',
    html: renderTagsOverview(tagIndex, ctx),
  });

  // ── 4. Home ─────────────────────────────────────────────────────────────────
  pages.add({ path: '/', file: 'index.html', kind: 'home', title: cfg.title, html: renderHome(collections, pathOf, ctx) });

  const all = pages.toArray();
  checkLinks(all, cfg.base_path);
  return { collections, pages: all, tags: [...tagIndex.keys()], paths };
}

export function buildSite(cfg: SiteConfig, opts: BuildOptions = {}): BuildResult {
  const logger = opts.logger ?? console;
  const layouts = opts.layouts ?? createLayoutRegistry();

  const collections = discoverCollections(cfg, layouts);
  const itemCount = collections.reduce((n, c) => n + c.items.length, 0);
  logger.log(`[sitegen] Discovered ${itemCount} items in ${collections.length} collections`);

  const result = renderSite(cfg, collections, layouts, logger);
  if (opts.write === false) return result;

  mkdirSync(cfg.out_dir, { recursive: true });
  for (const page of result.pages) write(join(cfg.out_dir, page.file), page.html);

  const pathOf = pathLookup(result.paths);
  write(
    join(cfg.out_dir, 'search_index.json'),
    JSON.stringify(buildSearchIndex(collections, pathOf, cfg), null, 2),
  );
  write(
    join(cfg.out_dir, 'site_index.json'),
    JSON.stringify(buildSiteIndex(collections, result.tags, pathOf, cfg), null, 2),
  );
  write(
    join(cfg.out_dir, 'build-manifest.json'),
    JSON.stringify(
      {
        built_at: (opts.now ?? (() => new Date()))().toISOString(),
        page_count: result.pages.length,
        item_count: itemCount,
        include_drafts: cfg.include_drafts,
      },
      null,
      2,
    ),
  );

  logger.log(`[sitegen] Wrote ${result.pages.length} pages to ${cfg.out_dir}`);
  return result;
}
