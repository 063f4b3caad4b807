/**
 * html.ts — Shared page chrome: document shell, navigation, breadcrumbs,
 * tag chips and item cards. Pure string builders.
 */

import { escapeHtml, formatDate, slugify } from './markdown.js';
import type { CollectionConfig, ContentItem, NavLink, SiteConfig } from './types.js';

export interface RenderContext {
  cfg: SiteConfig;
  nav: NavLink[];
}

export const TAGS_PATH = '/tags/';

/** Site-relative path → href under base_path. */
export function href(cfg: SiteConfig, path: string): string {
  return `${cfg.base_path}${path}`;
}

export function tagPath(tag: string): string {
  return `${TAGS_PATH}${slugify(tag)}/`;
}

export function buildNav(collections: CollectionConfig[]): NavLink[] {
  return [
    ...collections.filter((c) => c.listing).map((c) => ({ label: c.title, href: c.path })),
    { label: 'Tags', href: TAGS_PATH },
  ];
}

export function renderTags(tags: string[], cfg: SiteConfig): string {
  if (!tags.length) return '';
  return `<div class="content-tags">${tags
    .map((t) => `<a class="tag" href="${href(cfg, tagPath(t))}">${escapeHtml(t)}</a>`)
    .join(' ')}</div>`;
}

export function renderCard(item: ContentItem, itemPath: string, cfg: SiteConfig): string {
  const image = item.image
    ? `<img class="card-image" src="${escapeHtml(item.image)}" alt="" loading="lazy" />`
    : '';
  const date = item.date
    ? `<time datetime="${formatDate(item.date)}">${formatDate(item.date)}</time>`
    : '';
  return `<li class="card">
        ${image}
        <a class="card-title" href="${href(cfg, itemPath)}">${escapeHtml(item.title)}</a>
        ${date}
        ${item.description ? `<p class="card-description">${escapeHtml(item.description)}</p>` : ''}
        ${renderTags(item.tags, cfg)}
      </li>`;
}

export function baseLayout(ctx: RenderContext, opts: {
  title: string;
  description?: string;
  content: string;
  breadcrumbs?: NavLink[];
}): string {
  const { cfg, nav } = ctx;
  const { title, description, content, breadcrumbs } = opts;
  const navItems = nav
    .map((n) => `<li><a href="${href(cfg, n.href)}">${escapeHtml(n.label)}</a></li>`)
    .join('\n        ');

  const breadcrumbHtml = breadcrumbs
    ? `<nav class="breadcrumbs" aria-label="Breadcrumb">
      <ol>${breadcrumbs
        .map((b, i) =>
          i === breadcrumbs.length - 1
            ? `<li aria-current="page">${escapeHtml(b.label)}</li>`
            : `<li><a href="${href(cfg, b.href)}">${escapeHtml(b.label)}</a></li>`
        )
        .join('')}</ol>
    </nav>`
    : '';

  const pageTitle = title === cfg.title ? escapeHtml(title) : `${escapeHtml(title)} — ${escapeHtml(cfg.title)}`;
  const meta = description ?? cfg.description;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>${pageTitle}</title>
  ${meta ? `<meta name="description" content="${escapeHtml(meta)}" />` : ''}
  ${cfg.author ? `<meta name="author" content="${escapeHtml(cfg.author)}" />` : ''}
  <link rel="stylesheet" href="${href(cfg, cfg.stylesheet)}" />
</head>
<body>
  <header class="site-header">
    <a class="site-logo" href="${href(cfg, '/')}">${escapeHtml(cfg.title)}</a>
    <nav class="site-nav" aria-label="Main navigation">
      <ul>
        ${navItems}
      </ul>
    </nav>
  </header>
  <main>
    ${breadcrumbHtml}
    ${content}
  </main>
  <footer class="site-footer">
    <p>${cfg.author ? `&copy; ${escapeHtml(cfg.author)}` : escapeHtml(cfg.title)}</p>
  </footer>
</body>
</html>
`;
}
