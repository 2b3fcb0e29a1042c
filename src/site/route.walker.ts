/**
 * Route Walker
 *
 * Depth-bounded traversal over a finished route tree. Siblings are visited
 * in key order so every pass built on top of it is deterministic.
 *
 * Walks must not run while pages are still being registered.
 */

import type { Route } from './route.tree.ts';

/** Callback invoked once per visited route with its depth below the walk root (1 = child). */
export type WalkFn = (route: Route, depth: number) => void;

/** Use as `depth` to walk the whole tree. */
export const UNBOUNDED = -1;

/**
 * Visit every descendant of `root`, pre-order, stopping after `depth`
 * levels. `root` itself is not visited.
 */
export function walkRoutes(root: Route, depth: number, fn: WalkFn): void {
  walk(root, depth, 0, fn);
}

function walk(route: Route, depth: number, current: number, fn: WalkFn): void {
  if (depth !== UNBOUNDED && current === depth) return;
  const next = current + 1;
  for (const child of route.sortedChildren()) {
    fn(child, next);
    walk(child, depth, next, fn);
  }
}

/** Visit `root` and then every descendant. */
export function eachRoute(root: Route, fn: (route: Route) => void): void {
  fn(root);
  walkRoutes(root, UNBOUNDED, (route) => fn(route));
}
