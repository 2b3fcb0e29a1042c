/**
 * Site Generator - Build Tool
 *
 * Scans a content directory and builds the site model:
 *
 * 1. walk the directory for `*.md` files
 * 2. read and parse them in a pool of concurrent workers
 * 3. register each parsed article with the SiteBuilder as soon as it is ready
 * 4. derive list pages, index pages, navigation, footer and related links
 *
 * Any read or parse error aborts the build; the partial tree is dropped.
 */

import { SiteBuilder } from '../src/site/site.builder.ts';
import type { DeriveOptions } from '../src/type/settings.type.ts';
import type { ArticleData, Site } from '../src/type/site.type.ts';
import { logger } from '../src/type/logger.type.ts';
import type { FileSystem } from './fs.type.ts';
import { ArticleParseError, type ArticleParser, parseArticle } from './front-matter.parser.ts';

const CONTENT_EXTENSION = '.md';
const DEFAULT_CONCURRENCY = 8;

export interface GenerateOptions extends DeriveOptions {
  /** Number of files read and parsed at once (default: 8). */
  concurrency?: number;
  /** Article parser (default: front matter parser). */
  parse?: ArticleParser;
}

/** Walk directory recursively and collect content files, sorted */
export async function collectContentFiles(fs: FileSystem, dir: string): Promise<string[]> {
  const files: string[] = [];
  for await (const file of walkDirectory(fs, dir)) {
    if (file.endsWith(CONTENT_EXTENSION)) files.push(file);
  }
  return files.sort();
}

async function* walkDirectory(fs: FileSystem, dir: string): AsyncGenerator<string> {
  for await (const entry of fs.readDir(dir)) {
    const path = `${dir}/${entry.name}`;
    if (entry.isDirectory) {
      yield* walkDirectory(fs, path);
    } else if (entry.isFile) {
      yield path;
    }
  }
}

/**
 * Run `task` over `items` with at most `concurrency` tasks in flight.
 * Rejects with the first failure; workers stop picking up new items.
 * A `concurrency` that is not a positive integer is a RangeError.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  task: (item: T) => Promise<void>,
): Promise<void> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const item = items[next++];
      try {
        await task(item);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const size = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: size }, worker));
}

/** Build the site model from the content files under `contentDir`. */
export async function generateSite(
  contentDir: string,
  fs: FileSystem,
  options: GenerateOptions = {},
): Promise<Site> {
  const parse = options.parse ?? parseArticle;
  const builder = new SiteBuilder(contentDir);

  const files = await collectContentFiles(fs, contentDir);
  logger.info(`[Site Generator] Found ${files.length} content files in ${contentDir}/`);

  await runPool(files, options.concurrency ?? DEFAULT_CONCURRENCY, async (file) => {
    const source = await fs.readTextFile(file);

    let data: ArticleData;
    try {
      data = parse(source);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ArticleParseError(message, file);
    }

    builder.ingest(file, data);
  });

  const site = builder.derive(options);
  if (site.warnings.length > 0) {
    logger.warn(`[Site Generator] ${site.warnings.length} related links could not be resolved`);
  }
  return site;
}
