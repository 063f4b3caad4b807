/**
 * paths.ts — Stable output paths.
 *
 *   permalink present   →  permalink (normalised)
 *   otherwise           →  /<collection path>/<slug>/
 *
 * A path ending in "/" is written as "<path>index.html"; a path ending in
 * ".html" is written as that file.
 */

import { BuildError } from './errors.js';
import type { CollectionConfig, ContentItem } from './types.js';

export function normalizePermalink(permalink: string, source?: string): string {
  let p = permalink.trim();
  if (!p) throw new BuildError(`${source ?? 'permalink'}: permalink must not be empty`, source);
  if (/^[a-z][a-z0-9+.-]*:/i.test(p) || p.startsWith('//')) {
    throw new BuildError(`${source ?? 'permalink'}: permalink must be a site path, got "${permalink}"`, source);
  }
  if (!p.startsWith('/')) p = `/${p}`;
  p = p.replace(/\/{2,}/g, '/');
  if (p.split('/').some((seg) => seg === '..' || seg === '.')) {
    throw new BuildError(`${source ?? 'permalink'}: permalink must not contain "." or ".." segments`, source);
  }
  if (!p.endsWith('/') && !p.endsWith('.html')) p = `${p}/`;
  return p;
}

export function itemPath(item: ContentItem, collection: CollectionConfig): string {
  if (item.permalink !== undefined) return normalizePermalink(item.permalink, item.source);
  return `${collection.path}${item.slug}/`;
}

/** "/blog/hello/" → "blog/hello/index.html", "/about.html" → "about.html" */
export function pathToFile(path: string): string {
  const rel = path.replace(/^\/+/, '');
  if (rel === '' || rel.endsWith('/')) return `${rel}index.html`;
  return rel;
}
