/**
 * Site Types
 *
 * The in-memory model of a content-driven site: articles bound to route
 * paths, plus the views derived from them once registration is complete.
 */

import type { Route } from '../site/route.tree.ts';

/** Article fields as produced by a parser, before the builder assigns an id. */
export interface ArticleData {
  title: string;
  description: string;
  date: Date;
  /** Hidden articles appear in no derived view. */
  hide: boolean;
  /** Raw body, unrendered. */
  content: string;
  /** Related links of the form `<route-path>/<article-id>`. */
  related: string[];
}

/** A reference to another article, parsed from `<route-path>/<article-id>`. */
export interface RelatedLink {
  readonly path: string;
  readonly id: string;
}

/** A parsed content unit with its identity and resolved references. */
export interface Article {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly date: Date;
  readonly hide: boolean;
  readonly content: string;
  readonly related: readonly RelatedLink[];

  /** Filled by the related-article resolver. */
  relatedPages: Page[];
}

/** An article bound to the route it lives under. */
export interface Page {
  /** Route path, e.g. 'blog/coffee'. Empty for the root. */
  readonly path: string;
  readonly article: Article;
}

/** Derived overview of a route without an index page. */
export interface ListPage {
  readonly path: string;
  readonly pages: Page[];
}

/** User-provided landing page of a route, aggregating every visible page of the site. */
export interface IndexPage {
  readonly path: string;
  readonly article: Article;
  readonly pages: Page[];
}

export interface NavItem {
  label: string;
  target: string;
}

export interface Nav {
  brand: string;
  items: NavItem[];
}

export interface FooterItem {
  label: string;
  target: string;
}

export interface Footer {
  text: string;
  items: FooterItem[];
}

/** A related link that did not resolve to a visible page. */
export interface RelatedMiss {
  /** The page carrying the link. */
  from: Page;
  link: RelatedLink;
  reason: 'route' | 'article' | 'hidden';
}

/** The finished site model, read-only once derived. */
export interface Site {
  readonly root: Route;
  readonly nav: Nav;
  readonly footer: Footer;
  /** Broken related links found during derivation. */
  readonly warnings: readonly RelatedMiss[];
}
