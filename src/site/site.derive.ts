/**
 * Derivation Passes
 *
 * Run once over the finished route tree to compute the views a renderer
 * needs: list pages, index page aggregates and related-article links.
 * Hidden articles are excluded from every derived view.
 */

import type { Page, RelatedLink, RelatedMiss } from '../type/site.type.ts';
import { logger } from '../type/logger.type.ts';
import { formatRelatedLink } from '../util/path.util.ts';
import type { Route } from './route.tree.ts';
import { eachRoute } from './route.walker.ts';

function isVisible(page: Page): boolean {
  return !page.article.hide;
}

/** Newest first; equal dates keep their relative order. */
function byDateDesc(a: Page, b: Page): number {
  return b.article.date.getTime() - a.article.date.getTime();
}

export interface ListPageOptions {
  /** Order list pages newest first (default: true). */
  sortPages?: boolean;
}

/**
 * Give every route without an index page a list page of its visible pages.
 * The route's own page order is left untouched.
 */
export function buildListPages(root: Route, options: ListPageOptions = {}): void {
  const sortPages = options.sortPages ?? true;

  eachRoute(root, (route) => {
    if (route.indexPage) return;

    const pages = route.pages.filter(isVisible);
    if (sortPages) pages.sort(byDateDesc);

    route.listPage = { path: route.path, pages };
  });
}

/** Every visible page of the tree, root first, then in walk order. */
export function collectVisiblePages(root: Route): Page[] {
  const pages: Page[] = [];
  eachRoute(root, (route) => {
    for (const page of route.pages) {
      if (isVisible(page)) pages.push(page);
    }
  });
  return pages;
}

/**
 * Append every visible page of the whole site to each index page.
 * The aggregate is site-wide, not limited to the index route's subtree,
 * and is collected once for all index pages. With `sortPages` it is
 * ordered newest first like list pages.
 */
export function addArticlePagesToIndexPages(root: Route, options: ListPageOptions = {}): void {
  const visible = collectVisiblePages(root);
  if (options.sortPages ?? true) visible.sort(byDateDesc);

  eachRoute(root, (route) => {
    route.indexPage?.pages.push(...visible);
  });
}

/** Outcome of resolving one related link. */
export type Resolution =
  | { found: true; page: Page }
  | { found: false; reason: RelatedMiss['reason'] };

/** Resolve a related link against the tree. */
export function resolveLink(root: Route, link: RelatedLink): Resolution {
  const route = root.find(link.path);
  if (!route) return { found: false, reason: 'route' };

  const page = route.pages.find((p) => p.article.id === link.id);
  if (!page) return { found: false, reason: 'article' };
  if (!isVisible(page)) return { found: false, reason: 'hidden' };

  return { found: true, page };
}

/**
 * Populate `relatedPages` of every registered article, index pages
 * included. Links that do not resolve are logged and returned.
 */
export function resolveRelated(root: Route): RelatedMiss[] {
  const misses: RelatedMiss[] = [];

  eachRoute(root, (route) => {
    const owners: Page[] = route.indexPage ? [route.indexPage, ...route.pages] : route.pages;

    for (const page of owners) {
      for (const link of page.article.related) {
        const result = resolveLink(root, link);
        if (result.found) {
          page.article.relatedPages.push(result.page);
          continue;
        }

        misses.push({ from: page, link, reason: result.reason });
        const source = formatRelatedLink({ path: page.path, id: page.article.id });
        logger.warn(
          `Unresolved related link "${formatRelatedLink(link)}" in "${source}" (${result.reason})`,
        );
      }
    }
  });

  return misses;
}
