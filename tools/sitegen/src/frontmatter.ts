/**
 * frontmatter.ts — Content file → ContentItem.
 *
 * A content file is a YAML front-matter block between `---` markers,
 * followed by a markdown body:
 *
 *   ---
 *   layout: blog-detail
 *   name: "Async runtimes, from the bottom up"
 *   tags: [Rust, Concurrency]
 *   ---
 *   Body text…
 *
 * Parsing is pure: no I/O, no side effects beyond the returned record.
 */

import { basename, extname } from 'path';
import matter from 'gray-matter';
import yaml from 'js-yaml';
import { z } from 'zod';

import { ParseError } from './errors.js';
import { slugify } from './markdown.js';
import type { Layout } from './layouts.js';
import type { ContentItem } from './types.js';

/** Keys every layout understands. Layout-specific keys pass through. */
const CommonFrontmatter = z
  .object({
    layout: z.string({ required_error: 'is required' }).trim().min(1, 'must not be empty'),
    title: z.string().optional(),
    name: z.string().optional(),
    description: z.string().default(''),
    image: z.string().optional(),
    tags: z.array(z.string()).default([]),
    permalink: z.string().optional(),
    // YAML timestamps arrive as Date; quoted dates as strings. Nothing else is a date.
    date: z
      .union([z.date(), z.string().pipe(z.coerce.date())], {
        errorMap: () => ({ message: 'must be a date (YYYY-MM-DD)' }),
      })
      .optional(),
    draft: z.boolean().default(false),
  })
  .passthrough();

export interface ParseOptions {
  collection: string;
  /** When given, registered layouts also validate their own fields. */
  layouts?: ReadonlyMap<string, Layout>;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function loadMapping(text: string, source: string): Record<string, unknown> {
  let data: unknown;
  try {
    data = yaml.load(text, { filename: source });
  } catch (err) {
    throw new ParseError(source, `malformed front-matter: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (data === undefined || data === null) return {};
  if (!isRecord(data)) {
    throw new ParseError(source, 'front-matter must be a mapping of keys to values');
  }
  return data;
}

export interface SplitContent {
  data: Record<string, unknown>;
  body: string;
}

/**
 * Separate the front-matter mapping from the markdown body.
 * Returns null when the file does not open with a `---` block or never closes it.
 */
export function splitFrontmatter(raw: string, source = '<input>'): SplitContent | null {
  const text = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
  if (!matter.test(text)) return null;
  // gray-matter reads to end of file when the closing marker is missing.
  if (text.indexOf('\n---', 3) === -1) return null;

  let data: Record<string, unknown> = {};
  const file = matter(text, {
    engines: {
      yaml: (input: string) => {
        data = loadMapping(input, source);
        return data;
      },
    },
  });
  return { data, body: file.content };
}

/** Convert the first zod issue into a ParseError naming the field. */
export function toParseError(source: string, error: z.ZodError): ParseError {
  const issue = error.issues[0];
  const field = issue.path.length ? issue.path.join('.') : undefined;
  return new ParseError(source, issue.message, field);
}

export function parseContentItem(raw: string, source: string, opts: ParseOptions): ContentItem {
  const parts = splitFrontmatter(raw, source);
  if (!parts) {
    throw new ParseError(source, 'missing or unterminated front-matter block (expected leading and closing "---")');
  }
  const { data } = parts;

  const result = CommonFrontmatter.safeParse(data);
  if (!result.success) throw toParseError(source, result.error);
  const fm = result.data;

  const title = fm.title ?? fm.name;
  if (title === undefined) {
    throw new ParseError(source, 'is required (or "name")', 'title');
  }

  const slug = slugify(basename(source, extname(source)));
  if (!slug) {
    throw new ParseError(source, 'cannot derive a slug from the file name');
  }

  const item: ContentItem = {
    id: `${opts.collection}:${slug}`,
    collection: opts.collection,
    source,
    slug,
    layout: fm.layout,
    title,
    description: fm.description,
    tags: fm.tags,
    body: parts.body.replace(/^\s*\n/, ''),
    draft: fm.draft,
    fields: data,
  };
  if (fm.image !== undefined) item.image = fm.image;
  if (fm.permalink !== undefined) item.permalink = fm.permalink;
  if (fm.date !== undefined) item.date = fm.date;

  opts.layouts?.get(item.layout)?.validate(item);
  return item;
}
