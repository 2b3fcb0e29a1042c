/**
 * Site Settings
 *
 * User-facing configuration consumed by the navigation and footer builders.
 * Loading and validating the settings file is the caller's job.
 */

/** A configured link in the navigation bar or footer. */
export interface LinkSetting {
  label: string;
  target: string;
}

export interface NavSettings {
  /** When true, only configured items are shown and top-level routes are not added. */
  override?: boolean;
  items?: LinkSetting[];
}

export interface FooterSettings {
  text?: string;
  items?: LinkSetting[];
}

export interface SiteSettings {
  /** Site title, used as the navigation brand. */
  title?: string;
  nav?: NavSettings;
  footer?: FooterSettings;
}

/** Options for the derivation passes run after registration. */
export interface DeriveOptions {
  settings?: SiteSettings;
  /** Sort list pages newest first (default: true). */
  sortPages?: boolean;
}
