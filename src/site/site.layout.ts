/**
 * Navigation and Footer
 *
 * Map site settings (and, for navigation, the top-level routes) to the
 * view models shared by every rendered page.
 */

import type { Footer, Nav, NavItem } from '../type/site.type.ts';
import type { SiteSettings } from '../type/settings.type.ts';
import type { Route } from './route.tree.ts';
import { walkRoutes } from './route.walker.ts';

/** Capitalize the first letter of every word: 'coffee-beans' → 'Coffee-Beans', 'coffee_beans' → 'Coffee_beans'. */
export function titleCase(text: string): string {
  return text.replace(/(^|[^\p{L}\p{N}_])(\p{L})/gu, (_match, sep: string, letter: string) => sep + letter.toUpperCase());
}

/**
 * Build the navigation bar. Configured items come first; top-level routes
 * are appended in key order unless `settings.nav.override` is set.
 */
export function buildNav(root: Route, settings: SiteSettings = {}): Nav {
  const items: NavItem[] = (settings.nav?.items ?? []).map(({ label, target }) => ({ label, target }));

  if (!settings.nav?.override) {
    walkRoutes(root, 1, (route) => {
      items.push({ label: titleCase(route.key), target: route.key });
    });
  }

  return { brand: settings.title ?? '', items };
}

/** Build the footer. Independent of any page. */
export function buildFooter(settings: SiteSettings = {}): Footer {
  return {
    text: settings.footer?.text ?? '',
    items: (settings.footer?.items ?? []).map(({ label, target }) => ({ label, target })),
  };
}
