import { describe, it, expect } from 'vitest';

import { formatDate, renderMarkdown, slugify } from '../markdown.js';

describe('slugify', () => {
  it('lowercases and joins words with dashes', () => {
    expect(slugify('Line Follower: v2!')).toBe('line-follower-v2');
  });

  it('keeps letters of any script', () => {
    expect(slugify('Робототехника')).toBe('робототехника');
    expect(slugify('Café Society')).toBe('café-society');
  });

  it('collapses tags that differ only in punctuation', () => {
    expect(slugify('C++')).toBe(slugify('C#'));
  });

  it('returns an empty string when nothing is usable', () => {
    expect(slugify('++')).toBe('');
  });
});

describe('renderMarkdown', () => {
  it('returns the HTML string synchronously', () => {
    expect(renderMarkdown('Uses **five** sensors.')).toBe('<p>Uses <strong>five</strong> sensors.</p>');
  });

  it('renders GFM tables', () => {
    expect(renderMarkdown('| a |\n| - |\n| 1 |')).toContain('<table>');
  });

  it('renders a blank body as nothing', () => {
    expect(renderMarkdown('  \n')).toBe('');
  });
});

describe('formatDate', () => {
  it('formats in UTC', () => {
    expect(formatDate(new Date('2024-03-02T23:30:00-05:00'))).toBe('2024-03-03');
  });
});
