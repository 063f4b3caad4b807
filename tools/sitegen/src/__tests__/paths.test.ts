import { describe, it, expect } from 'vitest';

import { DEFAULT_COLLECTIONS } from '../config.js';
import { BuildError } from '../errors.js';
import { itemPath, normalizePermalink, pathToFile } from '../paths.js';
import type { ContentItem } from '../types.js';

const base: ContentItem = {
  id: 'blog:hello',
  collection: 'blog',
  source: 'content/blog/hello.md',
  slug: 'hello',
  layout: 'blog-detail',
  title: 'Hello',
  description: '',
  tags: [],
  body: '',
  draft: false,
  fields: {},
};
const blog = DEFAULT_COLLECTIONS[1];

describe('itemPath', () => {
  it('derives /<collection>/<slug>/ without a permalink', () => {
    expect(itemPath(base, blog)).toBe('/blog/hello/');
  });

  it('uses the permalink when present', () => {
    expect(itemPath({ ...base, permalink: 'publications' }, blog)).toBe('/publications/');
  });
});

describe('normalizePermalink', () => {
  it('adds the leading and trailing slash', () => {
    expect(normalizePermalink('about/me')).toBe('/about/me/');
  });

  it('keeps .html paths as files', () => {
    expect(normalizePermalink('/cv.html')).toBe('/cv.html');
  });

  it('collapses repeated slashes', () => {
    expect(normalizePermalink('/a//b/')).toBe('/a/b/');
  });

  it('rejects URLs, protocol-relative paths and dot segments', () => {
    expect(() => normalizePermalink('https://example.org/x/')).toThrow(BuildError);
    expect(() => normalizePermalink('//example.org/x/')).toThrow(BuildError);
    expect(() => normalizePermalink('/a/../b/')).toThrow(BuildError);
    expect(() => normalizePermalink('   ')).toThrow(BuildError);
  });
});

describe('pathToFile', () => {
  it('maps directory paths to index.html', () => {
    expect(pathToFile('/')).toBe('index.html');
    expect(pathToFile('/blog/hello/')).toBe('blog/hello/index.html');
  });

  it('maps .html paths to themselves', () => {
    expect(pathToFile('/cv.html')).toBe('cv.html');
  });
});
