import { describe, it, expect } from 'vitest';

import { ParseError } from '../errors.js';
import { parseContentItem, splitFrontmatter } from '../frontmatter.js';
import { createLayoutRegistry } from '../layouts.js';

/**
 * Content files → ContentItem. The key invariant: an item without a
 * usable `layout` never becomes a record.
 */

const layouts = createLayoutRegistry();

function parse(raw: string, source = 'content/projects/line-follower.md', collection = 'projects') {
  return parseContentItem(raw, source, { collection, layouts });
}

function parseErrorOf(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error('expected a ParseError');
}

describe('splitFrontmatter', () => {
  it('separates the YAML mapping from the body', () => {
    expect(splitFrontmatter('---\nlayout: x\n---\nHello')).toEqual({ data: { layout: 'x' }, body: 'Hello' });
  });

  it('accepts CRLF line endings and a leading BOM', () => {
    expect(splitFrontmatter('\uFEFF---\r\nlayout: x\r\n---\r\nHello')).toEqual({
      data: { layout: 'x' },
      body: 'Hello',
    });
  });

  it('accepts an empty block', () => {
    expect(splitFrontmatter('---\n---\nHello')).toEqual({ data: {}, body: 'Hello' });
  });

  it('does not share parsed data between identical inputs', () => {
    const first = splitFrontmatter('---\ntags: [a]\n---\n');
    const second = splitFrontmatter('---\ntags: [a]\n---\n');
    expect(second?.data).toEqual({ tags: ['a'] });
    expect(second?.data).not.toBe(first?.data);
  });

  it('returns null without a closing marker', () => {
    expect(splitFrontmatter('---\nlayout: x\nHello')).toBeNull();
  });

  it('returns null when the file does not start with a marker', () => {
    expect(splitFrontmatter('Hello\n---\nlayout: x\n---\n')).toBeNull();
  });

  it('reports malformed YAML against the source file', () => {
    expect(() => splitFrontmatter('---\ntags: [unclosed\n---\n', 'content/blog/a.md')).toThrow(
      /^content\/blog\/a\.md: malformed front-matter/,
    );
  });
});

describe('parseContentItem', () => {
  it('builds a project item from name, description, image and tags', () => {
    const item = parse(`---
layout: project-detail
name: "Line-following robot"
image: /images/lf.jpg
description: "Follows a taped track."
tags: [Robotics, Embedded]
---

Five reflectance sensors.
`);
    expect(item).toMatchObject({
      id: 'projects:line-follower',
      collection: 'projects',
      slug: 'line-follower',
      layout: 'project-detail',
      title: 'Line-following robot',
      image: '/images/lf.jpg',
      description: 'Follows a taped track.',
      tags: ['Robotics', 'Embedded'],
      draft: false,
    });
    expect(item.body).toBe('Five reflectance sensors.\n');
    expect(item.permalink).toBeUndefined();
  });

  it('prefers title over name and keeps collection-specific fields', () => {
    const item = parse(`---
layout: research
title: Research
name: ignored
permalink: /publications/
fields_of_interest: [Planning]
---
`, 'content/research/publications.md', 'research');
    expect(item.title).toBe('Research');
    expect(item.permalink).toBe('/publications/');
    expect(item.fields.fields_of_interest).toEqual(['Planning']);
  });

  it('parses YAML dates as UTC dates', () => {
    const item = parse('---\nlayout: blog-detail\nname: Post\ndate: 2024-03-02\n---\n', 'content/blog/post.md', 'blog');
    expect(item.date?.toISOString()).toBe('2024-03-02T00:00:00.000Z');
  });

  it('fails when date is empty', () => {
    const err = parseErrorOf(() => parse('---\nlayout: blog-detail\nname: X\ndate:\n---\n', 'content/blog/x.md', 'blog'));
    expect(err.field).toBe('date');
    expect(err.message).toBe('content/blog/x.md: date: must be a date (YYYY-MM-DD)');
  });

  it('fails when date is not a date', () => {
    expect(parseErrorOf(() => parse('---\nlayout: blog-detail\nname: X\ndate: true\n---\n')).field).toBe('date');
    expect(parseErrorOf(() => parse('---\nlayout: blog-detail\nname: X\ndate: 20240302\n---\n')).field).toBe('date');
    expect(parseErrorOf(() => parse('---\nlayout: blog-detail\nname: X\ndate: "soon"\n---\n')).field).toBe('date');
  });

  it('accepts a quoted ISO date', () => {
    const item = parse('---\nlayout: blog-detail\nname: X\ndate: "2024-03-02"\n---\n', 'content/blog/x.md', 'blog');
    expect(item.date?.toISOString()).toBe('2024-03-02T00:00:00.000Z');
  });

  it('derives slugs from non-Latin file names', () => {
    expect(parse('---\nlayout: project-detail\nname: X\n---\n', 'content/projects/Робот.md').slug).toBe('робот');
  });

  it('defaults description and tags', () => {
    const item = parse('---\nlayout: project-detail\nname: Bare\n---\n');
    expect(item.description).toBe('');
    expect(item.tags).toEqual([]);
    expect(item.body).toBe('');
  });

  it('fails with ParseError naming the layout field when layout is missing', () => {
    const err = parseErrorOf(() => parse('---\nname: No layout\n---\nBody'));
    expect(err.field).toBe('layout');
    expect(err.file).toBe('content/projects/line-follower.md');
    expect(err.message).toBe('content/projects/line-follower.md: layout: is required');
  });

  it('fails on an empty front-matter block (no layout)', () => {
    expect(parseErrorOf(() => parse('---\n---\nBody')).field).toBe('layout');
  });

  it('fails on an empty layout value', () => {
    expect(parseErrorOf(() => parse('---\nlayout: "  "\nname: X\n---\n')).field).toBe('layout');
  });

  it('fails without a front-matter block', () => {
    const err = parseErrorOf(() => parse('# Just markdown\n'));
    expect(err.field).toBeUndefined();
    expect(err.message).toMatch(/front-matter block/);
  });

  it('fails on malformed YAML', () => {
    const err = parseErrorOf(() => parse('---\nlayout: project-detail\ntags: [unclosed\n---\n'));
    expect(err.message).toMatch(/malformed front-matter/);
  });

  it('fails when the front-matter is not a mapping', () => {
    const err = parseErrorOf(() => parse('---\n- a\n- b\n---\n'));
    expect(err.message).toMatch(/must be a mapping/);
  });

  it('fails when tags is not a list of strings', () => {
    expect(parseErrorOf(() => parse('---\nlayout: project-detail\nname: X\ntags: Robotics\n---\n')).field).toBe('tags');
  });

  it('fails when neither title nor name is given', () => {
    expect(parseErrorOf(() => parse('---\nlayout: project-detail\n---\n')).field).toBe('title');
  });

  it('fails when a registered layout rejects its own fields', () => {
    const err = parseErrorOf(() =>
      parse('---\nlayout: blog-detail\nname: Post\ntg_post_link: not a url\n---\n', 'content/blog/post.md', 'blog'),
    );
    expect(err.field).toBe('tg_post_link');
  });

  it('rejects publication years that are not four digits', () => {
    const err = parseErrorOf(() =>
      parse(
        '---\nlayout: research\ntitle: R\npublications:\n  22:\n    - authors: A\n      name: P\n---\n',
        'content/research/r.md',
        'research',
      ),
    );
    expect(err.field).toBe('publications.22');
  });

  it('accepts an unregistered layout; rendering is where it fails', () => {
    const item = parse('---\nlayout: no-such-layout\nname: X\n---\n');
    expect(item.layout).toBe('no-such-layout');
  });
});
