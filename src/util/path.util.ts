/**
 * Content Path Utilities
 *
 * Pure functions mapping content file paths to route paths and article ids.
 *
 *   content/blog/coffee/roasting.md  →  route 'blog/coffee', id 'roasting'
 *   content/about.md                 →  route '',            id 'about'
 */

import type { RelatedLink } from '../type/site.type.ts';
import { SiteModelError } from '../type/error.type.ts';

/** Forward slashes, no leading './', no empty segments. */
function normalize(path: string): string {
  return path
    .replace(/\\/g, '/')
    .split('/')
    .filter((segment, i) => segment !== '' && !(i === 0 && segment === '.'))
    .join('/');
}

/** Path of `rawPath` relative to `contentRoot`. */
export function relativeContentPath(rawPath: string, contentRoot: string): string {
  const root = normalize(contentRoot);
  const file = normalize(rawPath);

  if (root === '' || root === '.') return file;

  if (!file.startsWith(`${root}/`)) {
    throw new SiteModelError(
      `Content file "${rawPath}" is not inside content root "${contentRoot}"`,
      'MALFORMED_PATH',
    );
  }
  return file.slice(root.length + 1);
}

/** Route path of a content file: the directory of its path relative to the content root. */
export function routePathOf(rawPath: string, contentRoot: string): string {
  const relative = relativeContentPath(rawPath, contentRoot);
  const slash = relative.lastIndexOf('/');
  return slash === -1 ? '' : relative.slice(0, slash);
}

/** Article id of a content file: its base name without the last extension. */
export function articleIdOf(rawPath: string): string {
  const file = normalize(rawPath);
  const base = file.slice(file.lastIndexOf('/') + 1);
  const dot = base.lastIndexOf('.');
  const id = dot > 0 ? base.slice(0, dot) : base;
  if (id === '') {
    throw new SiteModelError(`Content file "${rawPath}" has no name`, 'MALFORMED_PATH');
  }
  return id;
}

/**
 * Parse a related link of the form `<route-path>/<article-id>`.
 * A leading slash is ignored; a link without one addresses the root route.
 */
export function parseRelatedLink(link: string): RelatedLink {
  const trimmed = link.trim().replace(/^\/+/, '');
  const slash = trimmed.lastIndexOf('/');
  const path = slash === -1 ? '' : normalize(trimmed.slice(0, slash));
  const id = trimmed.slice(slash + 1);

  if (id === '') {
    throw new SiteModelError(`Malformed related link: "${link}"`, 'MALFORMED_LINK');
  }
  return { path, id };
}

/** Format a related link back to its string form. */
export function formatRelatedLink(link: RelatedLink): string {
  return link.path === '' ? link.id : `${link.path}/${link.id}`;
}
