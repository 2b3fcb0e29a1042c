/**
 * Atom Feed Plugin — Opt-in Output Plugin
 *
 * Collects one feed entry per visible article page and writes `atom.xml`
 * to the target directory when finalized.
 *
 * Usage:
 *   const atom = createAtomPlugin({ title: 'My Blog', baseUrl: 'https://example.com' }, nodeFs);
 *   await runPlugins(site, [atom], { targetDir: 'public' });
 *
 * @see https://www.rfc-editor.org/rfc/rfc4287
 */

import type { OutputContext, OutputPlugin } from '../src/site/site.plugins.ts';
import type { Page } from '../src/type/site.type.ts';
import { escapeHtml } from '../src/util/html.util.ts';
import type { FileSystem } from './fs.type.ts';

export const ATOM_FILENAME = 'atom.xml';

/** Feed metadata, usually taken from the site settings. */
export interface AtomMeta {
  title: string;
  /** Site origin, e.g. 'https://example.com'. Trailing slashes are ignored. */
  baseUrl: string;
  description?: string;
  /** Feed author; defaults to the title, since Atom requires one. */
  author?: string;
  subtitle?: string;
  copyright?: string;
}

/** A feed entry before XML serialization. */
export interface AtomEntry {
  title: string;
  url: string;
  summary: string;
  updated: Date;
}

/** Absolute URL of an article page. */
export function articleUrl(baseUrl: string, page: Page): string {
  const base = baseUrl.replace(/\/+$/, '');
  const path = page.path === '' ? '' : `/${page.path}`;
  return `${base}${path}/${page.article.id}`;
}

function serializeEntry(entry: AtomEntry): string {
  const loc = escapeHtml(entry.url);
  return [
    '  <entry>',
    `    <title>${escapeHtml(entry.title)}</title>`,
    `    <link href="${loc}"/>`,
    `    <id>${loc}</id>`,
    `    <updated>${entry.updated.toISOString()}</updated>`,
    `    <summary>${escapeHtml(entry.summary)}</summary>`,
    '  </entry>',
  ].join('\n');
}

/**
 * Serialize a feed. Entries are ordered newest first; the feed's
 * `<updated>` is the newest entry date, or `now` for an empty feed.
 */
export function renderAtomFeed(meta: AtomMeta, entries: readonly AtomEntry[], now = new Date()): string {
  const sorted = [...entries].sort((a, b) => b.updated.getTime() - a.updated.getTime());
  const updated = sorted[0]?.updated ?? now;
  const base = escapeHtml(meta.baseUrl.replace(/\/+$/, ''));

  const head = [
    `  <title>${escapeHtml(meta.title)}</title>`,
    `  <id>${base}</id>`,
    `  <link href="${base}"/>`,
    `  <updated>${updated.toISOString()}</updated>`,
  ];
  const subtitle = meta.subtitle ?? meta.description;
  if (subtitle) head.push(`  <subtitle>${escapeHtml(subtitle)}</subtitle>`);
  head.push(`  <author>\n    <name>${escapeHtml(meta.author ?? meta.title)}</name>\n  </author>`);
  if (meta.copyright) head.push(`  <rights>${escapeHtml(meta.copyright)}</rights>`);

  const body = [...head, ...sorted.map(serializeEntry)].join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>\n<feed xmlns="http://www.w3.org/2005/Atom">\n${body}\n</feed>\n`;
}

/** Create an Atom plugin that writes through `fs`. */
export function createAtomPlugin(meta: AtomMeta, fs: FileSystem): OutputPlugin {
  const entries: AtomEntry[] = [];

  return {
    onPage(page: Page): void {
      if (page.article.hide) return;
      entries.push({
        title: page.article.title,
        url: articleUrl(meta.baseUrl, page),
        summary: page.article.description,
        updated: page.article.date,
      });
    },

    async finalize(ctx: OutputContext): Promise<void> {
      const dir = ctx.targetDir.replace(/\/+$/, '');
      await fs.writeTextFile(`${dir}/${ATOM_FILENAME}`, renderAtomFeed(meta, entries));
    },
  };
}
