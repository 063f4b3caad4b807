/**
 * config.ts — Load site configuration from site.yaml + environment.
 *
 * site.yaml lives at the project root. Missing keys fall back to DEFAULTS;
 * a missing file means "all defaults". Environment variables win over both:
 *
 *   SITE_CONFIG      path to the YAML file   (default: ./site.yaml)
 *   CONTENT_DIR      content root            (default: ./content)
 *   OUT_DIR          output directory        (default: ./dist/site)
 *   BASE_PATH        URL prefix, e.g. "/repo" (default: "")
 *   INCLUDE_DRAFTS   "true" to render draft items
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';

import { ConfigError } from './errors.js';
import type { CollectionConfig, SiteConfig } from './types.js';

// ── Defaults ─────────────────────────────────────────────────────────

export const DEFAULT_COLLECTIONS: CollectionConfig[] = [
  { name: 'projects', title: 'Projects', layout: 'project-detail', dir: 'projects', path: '/projects/', sort: 'source', listing: true },
  { name: 'blog', title: 'Blog', layout: 'blog-detail', dir: 'blog', path: '/blog/', sort: 'date', listing: true },
  { name: 'research', title: 'Research', layout: 'research', dir: 'research', path: '/research/', sort: 'source', listing: true },
];

export const DEFAULTS: SiteConfig = {
  title: 'Personal Site',
  description: 'Projects, research and essays.',
  author: '',
  base_path: '',
  content_dir: 'content',
  out_dir: 'dist/site',
  include_drafts: false,
  stylesheet: '/styles/main.css',
  collections: DEFAULT_COLLECTIONS,
};

// ── Schema ───────────────────────────────────────────────────────────

const CollectionSchema = z.object({
  name: z.string().min(1),
  title: z.string().optional(),
  layout: z.string().min(1),
  dir: z.string().optional(),
  path: z.string().optional(),
  sort: z.enum(['source', 'date']).default('source'),
  listing: z.boolean().default(true),
});

const SiteFileSchema = z
  .object({
    title: z.string(),
    description: z.string(),
    author: z.string(),
    base_path: z.string(),
    content_dir: z.string(),
    out_dir: z.string(),
    include_drafts: z.boolean(),
    stylesheet: z.string(),
    collections: z.array(CollectionSchema),
  })
  .partial()
  .strict();

// ── Helpers ──────────────────────────────────────────────────────────

/** "/repo/" → "/repo", "repo" → "/repo", "/" → "" */
export function normalizeBasePath(p: string): string {
  const trimmed = p.trim().replace(/\/+$/, '');
  if (!trimmed) return '';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/** "blog" → "/blog/" */
export function normalizeSectionPath(p: string): string {
  const inner = p.trim().replace(/^\/+|\/+$/g, '');
  return inner ? `/${inner}/` : '/';
}

function toCollection(c: z.infer<typeof CollectionSchema>): CollectionConfig {
  return {
    name: c.name,
    title: c.title ?? c.name.charAt(0).toUpperCase() + c.name.slice(1),
    layout: c.layout,
    dir: c.dir ?? c.name,
    path: normalizeSectionPath(c.path ?? c.name),
    sort: c.sort,
    listing: c.listing,
  };
}

export function parseSiteConfig(raw: string, file: string): Partial<SiteConfig> {
  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (data === undefined || data === null) return {};

  const result = SiteFileSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(`${file}: ${where}${issue.message}`);
  }

  const { collections, ...rest } = result.data;
  const names = new Set<string>();
  for (const c of collections ?? []) {
    if (names.has(c.name)) throw new ConfigError(`${file}: duplicate collection "${c.name}"`);
    names.add(c.name);
  }
  return {
    ...rest,
    ...(collections ? { collections: collections.map(toCollection) } : {}),
  };
}

// ── Loader ───────────────────────────────────────────────────────────

export function loadSiteConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): SiteConfig {
  const file = resolve(cwd, env.SITE_CONFIG ?? 'site.yaml');
  const fromFile = existsSync(file) ? parseSiteConfig(readFileSync(file, 'utf-8'), file) : {};

  const merged: SiteConfig = { ...DEFAULTS, ...fromFile };

  if (env.CONTENT_DIR) merged.content_dir = env.CONTENT_DIR;
  if (env.OUT_DIR) merged.out_dir = env.OUT_DIR;
  if (env.BASE_PATH !== undefined) merged.base_path = env.BASE_PATH;
  if (env.INCLUDE_DRAFTS !== undefined) {
    if (env.INCLUDE_DRAFTS !== 'true' && env.INCLUDE_DRAFTS !== 'false') {
      throw new ConfigError(`INCLUDE_DRAFTS must be "true" or "false", got "${env.INCLUDE_DRAFTS}"`);
    }
    merged.include_drafts = env.INCLUDE_DRAFTS === 'true';
  }

  return {
    ...merged,
    base_path: normalizeBasePath(merged.base_path),
    content_dir: resolve(cwd, merged.content_dir),
    out_dir: resolve(cwd, merged.out_dir),
  };
}
