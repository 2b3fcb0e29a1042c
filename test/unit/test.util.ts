/**
 * Test Utilities
 *
 * Article factories and an in-memory FileSystem for site model tests.
 */

import type { Article, ArticleData, Page } from '../../src/type/site.type.ts';
import { parseRelatedLink } from '../../src/util/path.util.ts';
import type { DirEntry, FileSystem } from '../../tool/fs.type.ts';
import { FileSystemError } from '../../tool/fs.type.ts';

/** ArticleData with defaults for everything but what the test cares about. */
export function articleData(overrides: Partial<ArticleData> = {}): ArticleData {
  return {
    title: 'Untitled',
    description: '',
    date: new Date('2023-01-01T00:00:00Z'),
    hide: false,
    content: '',
    related: [],
    ...overrides,
  };
}

/** A Page for route `path`, bypassing the builder. */
export function page(
  path: string,
  id: string,
  overrides: Partial<ArticleData> = {},
): Page {
  const data = articleData({ title: id, ...overrides });
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
  return { path, article };
}

/** Article ids of a page list, in order. */
export function ids(pages: readonly Page[]): string[] {
  return pages.map((p) => p.article.id);
}

/** In-memory filesystem built from a path → content map. */
export function createMockFs(files: Record<string, string>): FileSystem & {
  written: Map<string, string>;
} {
  const dirs = new Map<string, DirEntry[]>();
  const written = new Map<string, string>();

  for (const filePath of Object.keys(files)) {
    const parts = filePath.split('/');
    for (let i = 1; i < parts.length; i++) {
      const dir = parts.slice(0, i).join('/');
      if (!dirs.has(dir)) dirs.set(dir, []);
    }

    const parentDir = parts.slice(0, -1).join('/');
    dirs.get(parentDir)?.push({ name: parts[parts.length - 1], isFile: true, isDirectory: false });

    for (let i = 1; i < parts.length - 1; i++) {
      const ancestorEntries = dirs.get(parts.slice(0, i).join('/')) ?? [];
      if (!ancestorEntries.some((e) => e.name === parts[i])) {
        ancestorEntries.push({ name: parts[i], isFile: false, isDirectory: true });
      }
    }
  }

  return {
    written,
    async *readDir(path: string) {
      const entries = dirs.get(path);
      if (!entries) throw new FileSystemError(`Not found: ${path}`, 'NOT_FOUND');
      for (const entry of entries) yield entry;
    },
    readTextFile(path: string) {
      const content = files[path];
      if (content === undefined) {
        return Promise.reject(new FileSystemError(`Not found: ${path}`, 'NOT_FOUND'));
      }
      return Promise.resolve(content);
    },
    writeTextFile(path: string, content: string) {
      written.set(path, content);
      return Promise.resolve();
    },
    exists: (path: string) => Promise.resolve(path in files || dirs.has(path)),
  };
}

/** Resolve after a few event-loop turns, to shuffle concurrent tasks. */
export function tick(turns: number): Promise<void> {
  let p = Promise.resolve();
  for (let i = 0; i < turns; i++) p = p.then(() => undefined);
  return p;
}
