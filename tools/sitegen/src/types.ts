/**
 * Core sitegen types: content items, collections, rendered pages.
 *
 * Content items are parsed once from markdown + front-matter and never
 * mutated afterwards. Pages are derived from items and the site config.
 */

// ──────────────────────────────────────────────────────────────────────────────
// Content
// ──────────────────────────────────────────────────────────────────────────────

export type SortPolicy = 'source' | 'date';

export interface ContentItem {
  /** "<collection>:<slug>", e.g. "blog:async-runtimes" */
  id: string;
  collection: string;
  /** Path of the source file, as discovered */
  source: string;
  slug: string;
  layout: string;
  title: string;
  description: string;
  image?: string;
  tags: string[];
  /** Markdown body (everything after the front-matter block) */
  body: string;
  permalink?: string;
  date?: Date;
  draft: boolean;
  /** Full front-matter mapping, collection-specific keys included */
  fields: Record<string, unknown>;
}

export interface Publication {
  authors: string;
  name: string;
  doi?: string;
}

export interface PublicationGroup {
  year: number;
  entries: Array<Publication & { source: string }>;
}

// ──────────────────────────────────────────────────────────────────────────────
// Collections
// ──────────────────────────────────────────────────────────────────────────────

export interface CollectionConfig {
  name: string;
  title: string;
  /** Default layout family; informational, each item declares its own */
  layout: string;
  /** Directory under content_dir */
  dir: string;
  /** URL prefix, e.g. "/blog/" */
  path: string;
  sort: SortPolicy;
  /** Emit a listing page at `path`? */
  listing: boolean;
}

export interface Collection extends CollectionConfig {
  items: ContentItem[];
}

// ──────────────────────────────────────────────────────────────────────────────
// Output
// ──────────────────────────────────────────────────────────────────────────────

export type PageKind = 'item' | 'listing' | 'tag' | 'tags' | 'home';

export interface Page {
  /** Site-relative URL, e.g. "/blog/hello/" */
  path: string;
  /** Output file relative to out_dir, e.g. "blog/hello/index.html" */
  file: string;
  kind: PageKind;
  title: string;
  html: string;
  /** Source file for item pages */
  source?: string;
}

export interface NavLink {
  label: string;
  href: string;
}

export interface SearchEntry {
  id: string;
  title: string;
  tags: string[];
  type: string;
  url: string;
  excerpt: string;
}

// ──────────────────────────────────────────────────────────────────────────────
// Build config  (site.yaml + env)
// ──────────────────────────────────────────────────────────────────────────────

export interface SiteConfig {
  title: string;
  description: string;
  author: string;
  /** Path prefix the site is served under, e.g. "/repo" ("" for the root) */
  base_path: string;
  content_dir: string;
  out_dir: string;
  include_drafts: boolean;
  /** Stylesheet href, relative to base_path */
  stylesheet: string;
  collections: CollectionConfig[];
}
