/**
 * links.ts — Internal link resolution.
 *
 * An internal link is an `<a href>` that is root-relative ("/blog/x/"),
 * optionally under base_path. Links whose last segment has a file
 * extension point at assets ("/files/cv.pdf") and are not checked; neither
 * are external, protocol-relative, relative or fragment-only links.
 */

import { BuildError } from './errors.js';
import type { Page } from './types.js';

const ANCHOR_HREF_RE = /<a\s[^>]*?href\s*=\s*(?:"([^"]*)"|'([^']*)')/gi;

export function findAnchorHrefs(html: string): string[] {
  const hrefs: string[] = [];
  for (const m of html.matchAll(ANCHOR_HREF_RE)) {
    hrefs.push((m[1] ?? m[2] ?? '').replace(/&amp;/g, '&'));
  }
  return hrefs;
}

/**
 * Map an href to the site path it should resolve to, or null when the
 * link is not subject to checking.
 */
export function internalTarget(rawHref: string, basePath: string): string | null {
  if (!rawHref.startsWith('/') || rawHref.startsWith('//')) return null;
  let p = rawHref.replace(/[?#].*$/, '');
  if (basePath) {
    if (p !== basePath && !p.startsWith(`${basePath}/`)) return null;
    p = p.slice(basePath.length) || '/';
  }
  const last = p.split('/').pop() ?? '';
  if (last.includes('.') && !last.endsWith('.html')) return null;
  if (!p.endsWith('/') && !p.endsWith('.html')) p = `${p}/`;
  try {
    return decodeURI(p);
  } catch {
    // Malformed escapes can never match an emitted page.
    return p;
  }
}

/** Throws BuildError on the first internal link that no page provides. */
export function checkLinks(pages: Page[], basePath: string): void {
  const known = new Set(pages.map((p) => p.path));
  for (const page of pages) {
    for (const h of findAnchorHrefs(page.html)) {
      const target = internalTarget(h, basePath);
      if (target === null || known.has(target)) continue;
      const from = page.source ?? page.path;
      throw new BuildError(`${from}: dangling link "${h}" (no page at ${target})`, page.source, target);
    }
  }
}
