/**
 * Route Tree
 *
 * Segment-keyed tree holding the site's pages. A route like `blog/coffee`
 * is stored as:
 *
 *   root
 *   └─ "blog"
 *      └─ "coffee" { pages: [...] }
 *
 * Nodes are created lazily on first registration and never removed.
 * The root has the empty path and is never itself a segment.
 */

import type { IndexPage, ListPage, Page } from '../type/site.type.ts';
import { SiteModelError } from '../type/error.type.ts';

/** Split a route path into segments. The root path '' has none. */
export function splitRoutePath(path: string): string[] {
  return path === '' ? [] : path.split('/');
}

/** Join a parent path and a child key. */
export function joinRoutePath(parent: string, key: string): string {
  return parent === '' ? key : `${parent}/${key}`;
}

/** A single node of the route tree. */
export class Route {
  /** Pages registered directly under this route, in registration order. */
  readonly pages: Page[] = [];

  /** Child routes keyed by segment. */
  readonly children = new Map<string, Route>();

  /** User-provided index page. Routes with one never get a list page. */
  indexPage?: IndexPage;

  /** Derived overview, set by buildListPages. */
  listPage?: ListPage;

  constructor(
    /** Full path, e.g. 'blog/coffee'. */
    readonly path: string,
    /** Own segment, e.g. 'coffee'. Empty for the root. */
    readonly key: string,
  ) {}

  /** Get or create the child for a segment. */
  child(key: string): Route {
    let node = this.children.get(key);
    if (!node) {
      node = new Route(joinRoutePath(this.path, key), key);
      this.children.set(key, node);
    } else if (node.path !== joinRoutePath(this.path, key)) {
      throw new SiteModelError(
        `Route "${node.path}" stored under "${this.path}" with key "${key}"`,
        'INVARIANT',
      );
    }
    return node;
  }

  /** Resolve a path relative to this route, or undefined. */
  find(path: string): Route | undefined {
    let node: Route | undefined = this;
    for (const segment of splitRoutePath(path)) {
      node = node.children.get(segment);
      if (!node) return undefined;
    }
    return node;
  }

  /** Child routes sorted by key. */
  sortedChildren(): Route[] {
    return [...this.children.values()].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }
}

/** The route tree of one build. */
export class RouteTree {
  readonly root = new Route('', '');

  /** Append a page to the route at `page.path`, creating missing nodes. */
  insert(page: Page): Route {
    const node = this.descend(page.path);
    node.pages.push(page);
    return node;
  }

  /** Store an index page on the route at `indexPage.path`, creating missing nodes. */
  setIndex(indexPage: IndexPage): Route {
    const node = this.descend(indexPage.path);
    if (node.indexPage) {
      throw new SiteModelError(
        `Route "${node.path}" already has an index page`,
        'INVARIANT',
      );
    }
    node.indexPage = indexPage;
    return node;
  }

  /** Resolve a path to its route. Throws NOT_FOUND if any segment is missing. */
  lookup(path: string): Route {
    const node = this.find(path);
    if (!node) {
      throw new SiteModelError(`Route not found: "${path}"`, 'NOT_FOUND');
    }
    return node;
  }

  /** Resolve a path to its route, or undefined. */
  find(path: string): Route | undefined {
    return this.root.find(path);
  }

  private descend(path: string): Route {
    const segments = splitRoutePath(path);
    if (segments.includes('')) {
      throw new SiteModelError(`Route path "${path}" has an empty segment`, 'MALFORMED_PATH');
    }

    let node = this.root;
    for (const segment of segments) {
      node = node.child(segment);
    }
    return node;
  }
}
