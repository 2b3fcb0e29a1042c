/**
 * Front Matter Article Parser
 *
 * Reads the YAML front matter of a Markdown content file into ArticleData.
 * The body is kept as-is; rendering it is up to the renderer.
 *
 *   ---
 *   title: Roasting Basics
 *   date: 2023-03-01
 *   related:
 *     - coffee/brewing
 *   ---
 *   Body...
 */

import matter from 'gray-matter';
import type { ArticleData } from '../src/type/site.type.ts';

export class ArticleParseError extends Error {
  constructor(
    message: string,
    /** Content file the error belongs to, when known. */
    public readonly file?: string,
  ) {
    super(file ? `${file}: ${message}` : message);
    this.name = 'ArticleParseError';
  }
}

/** Parser contract the site generator depends on. */
export type ArticleParser = (source: string) => ArticleData;

function optionalString(data: Record<string, unknown>, key: string): string {
  const value = data[key];
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') {
    throw new ArticleParseError(`"${key}" must be a string`);
  }
  return value;
}

function parseDate(value: unknown): Date {
  const date = value instanceof Date ? value : typeof value === 'string' ? new Date(value) : undefined;
  if (!date || Number.isNaN(date.getTime())) {
    throw new ArticleParseError(`"date" must be a valid date, got ${JSON.stringify(value)}`);
  }
  return new Date(date.getTime());
}

function parseRelated(value: unknown): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ArticleParseError('"related" must be a list of strings');
  }
  return [...value];
}

/**
 * Parse a Markdown file with YAML front matter. gray-matter caches results
 * by source text, so mutable values are copied out.
 */
export function parseArticle(source: string): ArticleData {
  let file: matter.GrayMatterFile<string>;
  try {
    file = matter(source);
  } catch (error) {
    throw new ArticleParseError(`Invalid front matter: ${error instanceof Error ? error.message : String(error)}`);
  }

  const data: Record<string, unknown> = file.data;

  const title = optionalString(data, 'title');
  if (title === '') {
    throw new ArticleParseError('"title" is required');
  }

  const hide = data.hide ?? false;
  if (typeof hide !== 'boolean') {
    throw new ArticleParseError('"hide" must be a boolean');
  }

  return {
    title,
    description: optionalString(data, 'description'),
    date: parseDate(data.date),
    hide,
    content: file.content,
    related: parseRelated(data.related),
  };
}
