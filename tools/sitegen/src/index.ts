#!/usr/bin/env node
/**
 * index.ts — sitegen entry point
 *
 * Reads content/<collection>/*.md, renders every item, listing and tag
 * page, and writes the static tree to OUT_DIR.
 *
 * Environment variables:
 *   SITE_CONFIG      default: "site.yaml"
 *   CONTENT_DIR      default: "content"
 *   OUT_DIR          default: "dist/site"
 *   BASE_PATH        default: "" (site served from the domain root)
 *   INCLUDE_DRAFTS   "true" to include draft items
 */

import { buildSite } from './assemble.js';
import { loadSiteConfig } from './config.js';
import { SiteBuildError } from './errors.js';

function main(): void {
  const cfg = loadSiteConfig();

  console.log(`[sitegen] Content: ${cfg.content_dir}`);
  console.log(`[sitegen] Output:  ${cfg.out_dir}`);
  console.log(`[sitegen] Drafts:  ${cfg.include_drafts}`);

  const result = buildSite(cfg);
  console.log(`[sitegen] Done — ${result.pages.length} pages, ${result.tags.length} tags`);
}

try {
  main();
} catch (err) {
  if (err instanceof SiteBuildError) {
    console.error(`[sitegen] Build failed: ${err.message}`);
  } else {
    console.error('[sitegen] Fatal error:', err);
  }
  process.exit(1);
}
