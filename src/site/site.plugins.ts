/**
 * Output Plugins
 *
 * Hands the finished site to output collaborators such as feed generators.
 * A plugin sees every visible article page once, then is finalized once.
 * Writing output is the plugin's own responsibility.
 */

import type { Page, Site } from '../type/site.type.ts';
import { collectVisiblePages } from './site.derive.ts';

/** Context shared with plugins for one output run. */
export interface OutputContext {
  /** Directory the rendered site is written to. */
  targetDir: string;
}

export interface OutputPlugin {
  /** Called once per visible article page. */
  onPage(page: Page, ctx: OutputContext): void | Promise<void>;

  /** Called once after every page has been delivered. Flush output here. */
  finalize(ctx: OutputContext): void | Promise<void>;
}

/** Deliver every visible page to every plugin, then finalize each plugin. */
export async function runPlugins(
  site: Site,
  plugins: readonly OutputPlugin[],
  ctx: OutputContext,
): Promise<void> {
  const pages = collectVisiblePages(site.root);

  for (const plugin of plugins) {
    for (const page of pages) {
      await plugin.onPage(page, ctx);
    }
    await plugin.finalize(ctx);
  }
}
