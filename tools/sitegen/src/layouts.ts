/**
 * layouts.ts — Layout registry and the built-in layouts.
 *
 * A layout binds a zod schema for its own front-matter keys to a pure
 * render function. The registry is an explicit map built once per build;
 * nothing registers itself as a side effect of being imported.
 */

import { z } from 'zod';

import { TemplateNotFoundError } from './errors.js';
import { toParseError } from './frontmatter.js';
import { baseLayout, renderTags, type RenderContext } from './html.js';
import { ResearchFields, groupPublications, renderPublicationGroups } from './listing.js';
import { escapeHtml, formatDate, renderMarkdown } from './markdown.js';
import type { CollectionConfig, ContentItem, NavLink } from './types.js';

export interface ItemContext extends RenderContext {
  collection: CollectionConfig;
  /** Output path of the item, e.g. "/blog/hello/" */
  path: string;
}

export interface Layout {
  readonly name: string;
  /** Throws ParseError when the item's front-matter does not fit the layout. */
  validate(item: ContentItem): void;
  render(item: ContentItem, ctx: ItemContext): string;
}

export interface LayoutDefinition<T> {
  name: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  render(item: ContentItem, fields: T, ctx: ItemContext): string;
}

export function defineLayout<T>(def: LayoutDefinition<T>): Layout {
  const fieldsOf = (item: ContentItem): T => {
    const result = def.schema.safeParse(item.fields);
    if (!result.success) throw toParseError(item.source, result.error);
    return result.data;
  };
  return {
    name: def.name,
    validate(item) {
      fieldsOf(item);
    },
    render(item, ctx) {
      return def.render(item, fieldsOf(item), ctx);
    },
  };
}

function breadcrumbs(item: ContentItem, ctx: ItemContext): NavLink[] {
  const crumbs: NavLink[] = [{ label: 'Home', href: '/' }];
  if (ctx.collection.listing) crumbs.push({ label: ctx.collection.title, href: ctx.collection.path });
  crumbs.push({ label: item.title, href: ctx.path });
  return crumbs;
}

function heroImage(item: ContentItem): string {
  if (!item.image) return '';
  return `<figure class="hero-image"><img src="${escapeHtml(item.image)}" alt="${escapeHtml(item.title)}" /></figure>`;
}

// ──────────────────────────────────────────────────────────────────────────────
// project-detail
// ──────────────────────────────────────────────────────────────────────────────

export const projectDetail = defineLayout({
  name: 'project-detail',
  // Common keys only.
  schema: z.object({}).passthrough(),
  render(item, _fields, ctx) {
    const content = `<article class="project-content">
    <header class="content-header">
      <h1>${escapeHtml(item.title)}</h1>
      ${renderTags(item.tags, ctx.cfg)}
    </header>
    ${heroImage(item)}
    ${item.description ? `<p class="lead">${escapeHtml(item.description)}</p>` : ''}
    <div class="project-body">
      ${renderMarkdown(item.body)}
    </div>
  </article>`;
    return baseLayout(ctx, {
      title: item.title,
      description: item.description || undefined,
      content,
      breadcrumbs: breadcrumbs(item, ctx),
    });
  },
});

// ──────────────────────────────────────────────────────────────────────────────
// blog-detail
// ──────────────────────────────────────────────────────────────────────────────

export const blogDetail = defineLayout({
  name: 'blog-detail',
  schema: z
    .object({ tg_post_link: z.string().url('must be an absolute URL').optional() })
    .passthrough(),
  render(item, fields, ctx) {
    const date = item.date
      ? `<time datetime="${formatDate(item.date)}">${formatDate(item.date)}</time>`
      : '';
    const discuss = fields.tg_post_link
      ? `<p class="discuss"><a href="${escapeHtml(fields.tg_post_link)}" rel="noopener">Discuss on Telegram</a></p>`
      : '';
    const content = `<article class="blog-content">
    <header class="content-header">
      <h1>${escapeHtml(item.title)}</h1>
      <div class="post-meta">
        ${date}
        ${renderTags(item.tags, ctx.cfg)}
      </div>
    </header>
    ${heroImage(item)}
    ${item.description ? `<p class="lead">${escapeHtml(item.description)}</p>` : ''}
    <div class="blog-body">
      ${renderMarkdown(item.body)}
    </div>
    ${discuss}
  </article>`;
    return baseLayout(ctx, {
      title: item.title,
      description: item.description || undefined,
      content,
      breadcrumbs: breadcrumbs(item, ctx),
    });
  },
});

// ──────────────────────────────────────────────────────────────────────────────
// research
// ──────────────────────────────────────────────────────────────────────────────

export const research = defineLayout({
  name: 'research',
  schema: ResearchFields,
  render(item, fields, ctx) {
    const interests = fields.fields_of_interest.length
      ? `<section class="fields-of-interest">
      <h2>Fields of interest</h2>
      <ul>${fields.fields_of_interest.map((f) => `<li>${escapeHtml(f)}</li>`).join('')}</ul>
    </section>`
      : '';
    const intro = renderMarkdown(item.body);
    const content = `<article class="research-content">
    <header class="content-header">
      <h1>${escapeHtml(item.title)}</h1>
      ${renderTags(item.tags, ctx.cfg)}
    </header>
    ${intro ? `<div class="research-body">${intro}</div>` : ''}
    ${interests}
    <section class="publications-list">
    ${renderPublicationGroups(groupPublications([item]))}
    </section>
  </article>`;
    return baseLayout(ctx, {
      title: item.title,
      description: item.description || undefined,
      content,
      breadcrumbs: breadcrumbs(item, ctx),
    });
  },
});

// ──────────────────────────────────────────────────────────────────────────────
// Registry
// ──────────────────────────────────────────────────────────────────────────────

export const BUILTIN_LAYOUTS: readonly Layout[] = [projectDetail, blogDetail, research];

export function createLayoutRegistry(layouts: readonly Layout[] = BUILTIN_LAYOUTS): ReadonlyMap<string, Layout> {
  const registry = new Map<string, Layout>();
  for (const layout of layouts) {
    if (registry.has(layout.name)) throw new Error(`Layout "${layout.name}" registered twice`);
    registry.set(layout.name, layout);
  }
  return registry;
}

export function resolveLayout(item: ContentItem, registry: ReadonlyMap<string, Layout>): Layout {
  const layout = registry.get(item.layout);
  if (!layout) throw new TemplateNotFoundError(item.layout, item.source);
  return layout;
}

/** Render one item through its declared layout. Pure: same input, same output. */
export function renderItem(
  item: ContentItem,
  registry: ReadonlyMap<string, Layout>,
  ctx: ItemContext,
): string {
  return resolveLayout(item, registry).render(item, ctx);
}
