/**
 * sitetree
 *
 * In-memory site model for static site generation: a route tree of
 * articles plus the list pages, index pages, navigation, footer and
 * related links derived from it.
 *
 * Build-time collaborators live in tool/:
 *   tool/site.generator.ts       — content directory → Site
 *   tool/front-matter.parser.ts  — Markdown front matter → ArticleData
 *   tool/atom.plugin.ts          — Atom feed output plugin
 *   tool/fs.node.ts              — Node FileSystem
 */

// Types
export type {
  Article,
  ArticleData,
  Footer,
  FooterItem,
  IndexPage,
  ListPage,
  Nav,
  NavItem,
  Page,
  RelatedLink,
  RelatedMiss,
  Site,
} from './type/site.type.ts';

export type {
  DeriveOptions,
  FooterSettings,
  LinkSetting,
  NavSettings,
  SiteSettings,
} from './type/settings.type.ts';

export { SiteModelError, type SiteModelErrorCode } from './type/error.type.ts';
export { type Logger, logger, setLogger } from './type/logger.type.ts';

// Site model
export { joinRoutePath, Route, RouteTree, splitRoutePath } from './site/route.tree.ts';
export { eachRoute, UNBOUNDED, walkRoutes, type WalkFn } from './site/route.walker.ts';
export { INDEX_ID, type IngestResult, SiteBuilder } from './site/site.builder.ts';
export {
  addArticlePagesToIndexPages,
  buildListPages,
  collectVisiblePages,
  type ListPageOptions,
  type Resolution,
  resolveLink,
  resolveRelated,
} from './site/site.derive.ts';
export { buildFooter, buildNav, titleCase } from './site/site.layout.ts';
export { type OutputContext, type OutputPlugin, runPlugins } from './site/site.plugins.ts';

// Utils
export {
  articleIdOf,
  formatRelatedLink,
  parseRelatedLink,
  relativeContentPath,
  routePathOf,
} from './util/path.util.ts';
export { escapeHtml } from './util/html.util.ts';
