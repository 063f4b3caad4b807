import { describe, it, expect } from 'vitest';

import { BuildError } from '../errors.js';
import { checkLinks, findAnchorHrefs, internalTarget } from '../links.js';
import type { Page } from '../types.js';

const page = (path: string, html: string, source?: string): Page => ({
  path,
  file: `${path.slice(1)}index.html`,
  kind: 'item',
  title: path,
  html,
  source,
});

describe('findAnchorHrefs', () => {
  it('collects anchor hrefs with either quote style', () => {
    const html = `<a href="/a/">A</a> <a class="x" href='/b/'>B</a> <link href="/style.css" /> <abbr title="t">T</abbr>`;
    expect(findAnchorHrefs(html)).toEqual(['/a/', '/b/']);
  });

  it('unescapes ampersands', () => {
    expect(findAnchorHrefs('<a href="/q/?a=1&amp;b=2">q</a>')).toEqual(['/q/?a=1&b=2']);
  });
});

describe('internalTarget', () => {
  it('normalises root-relative page links', () => {
    expect(internalTarget('/blog/hello', '')).toBe('/blog/hello/');
    expect(internalTarget('/blog/hello/#intro', '')).toBe('/blog/hello/');
    expect(internalTarget('/', '')).toBe('/');
    expect(internalTarget('/cv.html', '')).toBe('/cv.html');
  });

  it('skips external, relative, fragment and asset links', () => {
    expect(internalTarget('https://example.org/', '')).toBeNull();
    expect(internalTarget('//cdn.example.org/x', '')).toBeNull();
    expect(internalTarget('../other/', '')).toBeNull();
    expect(internalTarget('#top', '')).toBeNull();
    expect(internalTarget('/files/cv.pdf', '')).toBeNull();
  });

  it('strips base_path and ignores links outside it', () => {
    expect(internalTarget('/site/blog/', '/site')).toBe('/blog/');
    expect(internalTarget('/site', '/site')).toBe('/');
    expect(internalTarget('/elsewhere/', '/site')).toBeNull();
  });
});

describe('checkLinks', () => {
  it('accepts links that resolve to emitted pages', () => {
    const pages = [page('/a/', '<a href="/b/">b</a>'), page('/b/', '<a href="/a/#top">a</a>')];
    expect(() => checkLinks(pages, '')).not.toThrow();
  });

  it('fails with BuildError on a dangling link, naming the source file', () => {
    const pages = [page('/a/', '<a href="/missing/">m</a>', 'content/blog/a.md')];
    expect(() => checkLinks(pages, '')).toThrow(BuildError);
    expect(() => checkLinks(pages, '')).toThrow(
      'content/blog/a.md: dangling link "/missing/" (no page at /missing/)',
    );
  });
});
