export { buildSite, renderSite, type BuildOptions, type BuildResult, type BuildLogger } from './assemble.js';
export { loadSiteConfig, parseSiteConfig, DEFAULTS } from './config.js';
export { discoverCollections } from './discover.js';
export { BuildError, ConfigError, ParseError, SiteBuildError, TemplateNotFoundError } from './errors.js';
export { parseContentItem, splitFrontmatter } from './frontmatter.js';
export {
  BUILTIN_LAYOUTS,
  createLayoutRegistry,
  defineLayout,
  renderItem,
  type ItemContext,
  type Layout,
  type LayoutDefinition,
} from './layouts.js';
export { buildTagIndex, groupPublications, sortItems } from './listing.js';
export type * from './types.js';
