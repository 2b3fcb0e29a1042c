/**
 * Site Builder
 *
 * Owns the route tree for the duration of a build:
 * - ingest parsed articles and register them under their route
 * - derive list pages, index aggregates, navigation, footer and related links
 *
 * Registration is synchronous and never awaits, so while any number of
 * async workers parse content concurrently, exactly one tree mutation runs
 * at a time. Derivation seals the builder; later registrations throw.
 */

import type { Article, ArticleData, IndexPage, Page, Site } from '../type/site.type.ts';
import type { DeriveOptions } from '../type/settings.type.ts';
import { SiteModelError } from '../type/error.type.ts';
import { articleIdOf, parseRelatedLink, routePathOf } from '../util/path.util.ts';
import { RouteTree } from './route.tree.ts';
import { addArticlePagesToIndexPages, buildListPages, resolveRelated } from './site.derive.ts';
import { buildFooter, buildNav } from './site.layout.ts';

/** File name (without extension) that marks a route's index page. */
export const INDEX_ID = 'index';

/** Result of ingesting one content file. */
export type IngestResult =
  | { kind: 'page'; page: Page }
  | { kind: 'index'; page: IndexPage };

export class SiteBuilder {
  private readonly tree = new RouteTree();
  private site?: Site;

  constructor(
    /** Directory all content file paths start with, e.g. 'my-site/content'. */
    readonly contentRoot: string,
  ) {}

  /**
   * Compute the route path and id of a parsed content file and register it.
   * `index` files become the route's index page. Throws MALFORMED_PATH or
   * MALFORMED_LINK without touching the tree.
   */
  ingest(rawPath: string, data: ArticleData): IngestResult {
    const path = routePathOf(rawPath, this.contentRoot);
    const id = articleIdOf(rawPath);

    const article: Article = {
      id,
      title: data.title,
      description: data.description,
      date: data.date,
      hide: data.hide,
      content: data.content,
      related: data.related.map(parseRelatedLink),
      relatedPages: [],
    };

    if (id === INDEX_ID) {
      const page: IndexPage = { path, article, pages: [] };
      this.registerIndex(page);
      return { kind: 'index', page };
    }

    const page: Page = { path, article };
    this.register(page);
    return { kind: 'page', page };
  }

  /** Add a page to the tree. */
  register(page: Page): void {
    this.assertOpen();
    this.tree.insert(page);
  }

  /** Set the index page of a route. */
  registerIndex(indexPage: IndexPage): void {
    this.assertOpen();
    this.tree.setIndex(indexPage);
  }

  /**
   * Run every derivation pass over the registered pages and return the
   * finished site. Runs once; subsequent calls return the same site.
   */
  derive(options: DeriveOptions = {}): Site {
    if (this.site) return this.site;

    const root = this.tree.root;
    const nav = buildNav(root, options.settings);
    buildListPages(root, { sortPages: options.sortPages });
    addArticlePagesToIndexPages(root, { sortPages: options.sortPages });
    const warnings = resolveRelated(root);
    const footer = buildFooter(options.settings);

    this.site = { root, nav, footer, warnings };
    return this.site;
  }

  /** Read access to the tree, e.g. for lookups before derivation. */
  get routes(): RouteTree {
    return this.tree;
  }

  private assertOpen(): void {
    if (this.site) {
      throw new SiteModelError('Cannot register pages after the site has been derived', 'SEALED');
    }
  }
}
