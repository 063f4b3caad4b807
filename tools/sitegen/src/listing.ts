/**
 * listing.ts — Collection listings, publication grouping and tag indexes.
 *
 * Ordering rules:
 *   - "source" sort keeps discovery order (file name order)
 *   - "date" sort is newest first; undated items last; ties keep source order
 *   - publications: year descending, then source order within a year
 *   - tags: sorted by name, items in insertion order
 */

import { z } from 'zod';

import { toParseError } from './frontmatter.js';
import { TAGS_PATH, baseLayout, href, renderCard, tagPath, type RenderContext } from './html.js';
import { escapeHtml, slugify } from './markdown.js';
import type { Collection, ContentItem, PublicationGroup, SortPolicy } from './types.js';

// ──────────────────────────────────────────────────────────────────────────────
// Research front-matter
// ──────────────────────────────────────────────────────────────────────────────

const PublicationSchema = z.object({
  authors: z
    .union([z.string(), z.array(z.string())])
    .transform((a) => (Array.isArray(a) ? a.join(', ') : a)),
  name: z.string(),
  doi: z.union([z.string(), z.number()]).transform(String).optional(),
});

export const ResearchFields = z.object({
  fields_of_interest: z.array(z.string()).default([]),
  publications: z
    .record(z.string().regex(/^\d{4}$/, 'publication years must be four-digit years'), z.array(PublicationSchema))
    .default({}),
});

export type ResearchFieldsData = z.infer<typeof ResearchFields>;

// ──────────────────────────────────────────────────────────────────────────────
// Ordering
// ──────────────────────────────────────────────────────────────────────────────

export function sortItems(items: ContentItem[], policy: SortPolicy): ContentItem[] {
  if (policy === 'source') return items.slice();
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => {
      const ta = a.item.date?.getTime();
      const tb = b.item.date?.getTime();
      if (ta !== undefined && tb !== undefined && ta !== tb) return tb - ta;
      if (ta === undefined && tb !== undefined) return 1;
      if (ta !== undefined && tb === undefined) return -1;
      return a.index - b.index;
    })
    .map(({ item }) => item);
}

/**
 * Merge the publications of every item into year groups, newest year first.
 * Items that are not research items (no `publications` key) contribute nothing.
 */
export function groupPublications(items: ContentItem[]): PublicationGroup[] {
  const byYear = new Map<number, PublicationGroup>();
  for (const item of items) {
    if (!('publications' in item.fields)) continue;
    const parsed = ResearchFields.safeParse(item.fields);
    if (!parsed.success) throw toParseError(item.source, parsed.error);
    const { publications } = parsed.data;
    // Object key order puts integer-like keys first, ascending; years are re-sorted below.
    for (const [key, entries] of Object.entries(publications)) {
      const year = Number(key);
      let group = byYear.get(year);
      if (!group) {
        group = { year, entries: [] };
        byYear.set(year, group);
      }
      for (const p of entries) group.entries.push({ ...p, source: item.source });
    }
  }
  return [...byYear.values()].sort((a, b) => b.year - a.year);
}

/**
 * tag → items, keys sorted by tag name.
 *
 * Tags that share a URL slug ("Robotics", "robotics") are one tag, labelled
 * with the spelling seen first.
 */
export function buildTagIndex(items: ContentItem[]): Map<string, ContentItem[]> {
  const bySlug = new Map<string, { label: string; members: ContentItem[] }>();
  for (const item of items) {
    const seen = new Set<string>();
    for (const tag of item.tags) {
      const key = slugify(tag);
      if (seen.has(key)) continue;
      seen.add(key);
      const entry = bySlug.get(key);
      if (entry) entry.members.push(item);
      else bySlug.set(key, { label: tag, members: [item] });
    }
  }
  const entries = [...bySlug.values()].sort((a, b) => a.label.localeCompare(b.label, 'en'));
  return new Map(entries.map((e) => [e.label, e.members]));
}

// ──────────────────────────────────────────────────────────────────────────────
// Renderers
// ──────────────────────────────────────────────────────────────────────────────

export function doiHref(doi: string): string {
  return /^https?:\/\//i.test(doi) ? doi : `https://doi.org/${doi.replace(/^doi:/i, '')}`;
}

export function renderPublicationGroups(groups: PublicationGroup[]): string {
  if (!groups.length) return '<p class="empty-page">No publications yet.</p>';
  return groups
    .map(
      (g) => `<section class="publication-year" id="y${g.year}">
      <h2>${g.year}</h2>
      <ol class="publications">${g.entries
        .map(
          (p) => `
        <li class="publication">
          <span class="publication-authors">${escapeHtml(p.authors)}</span>
          <span class="publication-name">${escapeHtml(p.name)}</span>
          ${p.doi ? `<a class="publication-doi" href="${escapeHtml(doiHref(p.doi))}">${escapeHtml(p.doi)}</a>` : ''}
        </li>`,
        )
        .join('')}
      </ol>
    </section>`,
    )
    .join('\n    ');
}

/** pathOf maps an item to its output path (resolved by the assembler). */
export type PathOf = (item: ContentItem) => string;

export function renderCollectionListing(
  collection: Collection,
  pathOf: PathOf,
  ctx: RenderContext,
): string {
  const items = sortItems(collection.items, collection.sort);
  let body: string;
  if (collection.layout === 'research') {
    const groups = groupPublications(items);
    const pages = items
      .map((i) => `<li><a href="${href(ctx.cfg, pathOf(i))}">${escapeHtml(i.title)}</a></li>`)
      .join('');
    body = `${pages ? `<ul class="research-pages">${pages}</ul>` : ''}
    ${renderPublicationGroups(groups)}`;
  } else {
    const cards = items.map((i) => renderCard(i, pathOf(i), ctx.cfg)).join('\n      ');
    body = `<ul class="card-list">
      ${cards || '<li class="empty-page">Nothing here yet.</li>'}
    </ul>`;
  }

  return baseLayout(ctx, {
    title: collection.title,
    content: `<section class="listing listing-${escapeHtml(collection.name)}">
    <header class="content-header">
      <h1>${escapeHtml(collection.title)}</h1>
    </header>
    ${body}
  </section>`,
    breadcrumbs: [
      { label: 'Home', href: '/' },
      { label: collection.title, href: collection.path },
    ],
  });
}

export function renderTagsOverview(index: Map<string, ContentItem[]>, ctx: RenderContext): string {
  const items = [...index.entries()]
    .map(
      ([tag, members]) =>
        `<li><a class="tag" href="${href(ctx.cfg, tagPath(tag))}">${escapeHtml(tag)}</a> <span class="tag-count">${members.length}</span></li>`,
    )
    .join('\n      ');
  return baseLayout(ctx, {
    title: 'Tags',
    content: `<section class="listing listing-tags">
    <header class="content-header"><h1>Tags</h1></header>
    <ul class="tag-list">
      ${items || '<li class="empty-page">No tags yet.</li>'}
    </ul>
  </section>`,
    breadcrumbs: [
      { label: 'Home', href: '/' },
      { label: 'Tags', href: TAGS_PATH },
    ],
  });
}

export function renderTagPage(
  tag: string,
  members: ContentItem[],
  pathOf: PathOf,
  ctx: RenderContext,
): string {
  const cards = members.map((i) => renderCard(i, pathOf(i), ctx.cfg)).join('\n      ');
  return baseLayout(ctx, {
    title: `Tagged “${tag}”`,
    content: `<section class="listing listing-tag">
    <header class="content-header"><h1>Tagged “${escapeHtml(tag)}”</h1></header>
    <ul class="card-list">
      ${cards}
    </ul>
  </section>`,
    breadcrumbs: [
      { label: 'Home', href: '/' },
      { label: 'Tags', href: TAGS_PATH },
      { label: tag, href: tagPath(tag) },
    ],
  });
}

export function renderHome(collections: Collection[], pathOf: PathOf, ctx: RenderContext, maxItems = 5): string {
  const sections = collections
    .filter((c) => c.items.length > 0)
    .map((c) => {
      const items = sortItems(c.items, c.sort).slice(0, maxItems);
      const more = c.listing
        ? `<a class="more" href="${href(ctx.cfg, c.path)}">All ${escapeHtml(c.title.toLowerCase())} →</a>`
        : '';
      return `<section class="home-section">
      <h2>${escapeHtml(c.title)}</h2>
      <ul class="content-list">${items
        .map((i) => `<li><a href="${href(ctx.cfg, pathOf(i))}">${escapeHtml(i.title)}</a></li>`)
        .join('')}</ul>
      ${more}
    </section>`;
    })
    .join('\n    ');

  return baseLayout(ctx, {
    title: ctx.cfg.title,
    content: `<div class="home">
    <section class="hero">
      <h1>${escapeHtml(ctx.cfg.title)}</h1>
      ${ctx.cfg.description ? `<p class="hero-sub">${escapeHtml(ctx.cfg.description)}</p>` : ''}
    </section>
    ${sections}
  </div>`,
  });
}
