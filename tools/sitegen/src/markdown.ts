/**
 * markdown.ts — Markdown → HTML plus the small text helpers the layouts share.
 */

import { marked } from 'marked';

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/** Letters and digits of any script survive; everything else becomes '-'. */
export function slugify(text: string): string {
  return text.normalize('NFC').toLowerCase().replace(/[^\p{L}\p{N}]+/gu, '-').replace(/(^-|-$)/g, '');
}

/** GitHub-flavoured markdown, synchronous. Authored content is trusted. */
export function renderMarkdown(md: string): string {
  if (!md.trim()) return '';
  return marked.parser(marked.lexer(md, { gfm: true })).trimEnd();
}

/** Strip markdown / HTML markup to plain text (search excerpts, descriptions). */
export function stripMarkup(text: string): string {
  return text
    .replace(/```[\s\S]*?```/g, ' ')             // fenced code blocks
    .replace(/<[^>]+>/g, ' ')                    // HTML tags
    .replace(/!\[[^\]]*\]\([^)]*\)/g, ' ')       // markdown images
    .replace(/\[([^\]]*)\]\([^)]*\)/g, '$1')     // markdown links (keep text)
    .replace(/[#*_~`>|]/g, ' ')                  // formatting chars
    .replace(/\s+/g, ' ')
    .trim();
}

/** UTC "YYYY-MM-DD"; independent of the build machine's locale and zone. */
export function formatDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}
