/**
 * Unit tests for the site generator
 *
 * Runs the full pipeline (walk, parse, ingest, derive) against an
 * in-memory filesystem.
 */

import { describe, expect, test } from 'vitest';
import { ArticleParseError } from '../../tool/front-matter.parser.ts';
import { collectContentFiles, generateSite, runPool } from '../../tool/site.generator.ts';
import { FileSystemError } from '../../tool/fs.type.ts';
import { createMockFs, ids, tick } from './test.util.ts';

function md(title: string, date: string, extra = ''): string {
  return `---\ntitle: ${title}\ndate: ${date}\n${extra}---\nText about ${title}.\n`;
}

const FILES: Record<string, string> = {
  'site/content/index.md': md('Home', '2023-01-01'),
  'site/content/about.md': md('About', '2022-06-01'),
  'site/content/blog/post-1.md': md('Post 1', '2023-01-10'),
  'site/content/blog/post-2.md': md('Post 2', '2023-02-10', 'related:\n  - blog/post-1\n  - blog/gone\n'),
  'site/content/blog/draft.md': md('Draft', '2023-03-10', 'hide: true\n'),
  'site/content/blog/coffee/beans.md': md('Beans', '2023-01-20'),
  'site/content/blog/coffee/notes.txt': 'not content',
};

describe('collectContentFiles', () => {
  test('finds markdown files recursively, sorted', async () => {
    const files = await collectContentFiles(createMockFs(FILES), 'site/content');

    expect(files).toEqual([
      'site/content/about.md',
      'site/content/blog/coffee/beans.md',
      'site/content/blog/draft.md',
      'site/content/blog/post-1.md',
      'site/content/blog/post-2.md',
      'site/content/index.md',
    ]);
  });

  test('missing content directory raises NOT_FOUND', async () => {
    await expect(collectContentFiles(createMockFs(FILES), 'nope')).rejects.toBeInstanceOf(FileSystemError);
  });
});

describe('generateSite', () => {
  test('builds the site model', async () => {
    const site = await generateSite('site/content', createMockFs(FILES), {
      concurrency: 3,
      settings: { title: 'Coffee' },
    });

    expect(site.nav).toEqual({ brand: 'Coffee', items: [{ label: 'Blog', target: 'blog' }] });

    const blog = site.root.children.get('blog');
    expect(ids(blog?.listPage?.pages ?? [])).toEqual(['post-2', 'post-1']);
    expect(ids(blog?.children.get('coffee')?.listPage?.pages ?? [])).toEqual(['beans']);

    expect(site.root.indexPage?.article.title).toBe('Home');
    expect(ids(site.root.indexPage?.pages ?? [])).toEqual(['post-2', 'beans', 'post-1', 'about']);

    const post2 = blog?.pages.find((p) => p.article.id === 'post-2');
    const post1 = blog?.pages.find((p) => p.article.id === 'post-1');
    expect(post2?.article.relatedPages).toHaveLength(1);
    expect(post2?.article.relatedPages[0]).toBe(post1);

    expect(site.warnings.map((w) => `${w.link.path}/${w.link.id}`)).toEqual(['blog/gone']);
  });

  test('a parse error aborts the build and names the file', async () => {
    const fs = createMockFs({ ...FILES, 'site/content/blog/broken.md': '---\ndate: 2023-01-01\n---\n' });

    const build = generateSite('site/content', fs);

    await expect(build).rejects.toBeInstanceOf(ArticleParseError);
    await expect(build).rejects.toThrow('site/content/blog/broken.md: "title" is required');
  });

  test('uses a custom parser', async () => {
    const site = await generateSite('c', createMockFs({ 'c/x/a.md': 'A', 'c/x/b.md': 'B' }), {
      parse: (source) => ({
        title: source,
        description: '',
        date: new Date(source === 'A' ? '2023-01-01' : '2023-02-01'),
        hide: false,
        content: source,
        related: [],
      }),
    });

    expect(ids(site.root.children.get('x')?.listPage?.pages ?? [])).toEqual(['b', 'a']);
  });
});

describe('runPool', () => {
  test('never exceeds the concurrency limit and runs every item', async () => {
    let active = 0;
    let peak = 0;
    const done: number[] = [];

    await runPool([1, 2, 3, 4, 5, 6, 7], 3, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await tick(n);
      done.push(n);
      active--;
    });

    expect(peak).toBe(3);
    expect([...done].sort()).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  test('stops after the first failure', async () => {
    const started: number[] = [];

    const run = runPool([1, 2, 3, 4], 1, async (n) => {
      started.push(n);
      if (n === 2) throw new Error('fail');
    });

    await expect(run).rejects.toThrow('fail');
    expect(started).toEqual([1, 2]);
  });

  test.each([Number.NaN, 0, -1, 1.5])('rejects concurrency %s without running anything', async (concurrency) => {
    let ran = 0;

    await expect(
      runPool([1, 2, 3], concurrency, async () => {
        ran++;
      }),
    ).rejects.toThrow(RangeError);
    expect(ran).toBe(0);
  });

  test('generateSite fails on an invalid concurrency', async () => {
    await expect(generateSite('site/content', createMockFs(FILES), { concurrency: Number.NaN })).rejects.toThrow(
      'Concurrency must be a positive integer, got NaN',
    );
  });

  test('empty input resolves', async () => {
    await expect(runPool([], 4, async () => {})).resolves.toBeUndefined();
  });
});
