import type { SiteConfig } from "../config";
import type { TocItem } from "./structured-content";

/** Site-wide values every layout sees as `site`. */
export interface SiteModel {
  title: string;
  author: string;
  language: string;
  base_url: string;
  theme_rtl: boolean;
  theme_inverted: boolean;
  analytics_id?: string;
  custom_stylesheets: string[];
  title_format: string;
  toc: boolean;
  feed: boolean;
  params: Record<string, unknown>;
}

/** One published document as layouts see it as `page`. */
export interface PageModel {
  title: string;
  date: Date;
  /** ISO-8601 form of `date`, for `<time datetime>` */
  dateIso: string;
  slug: string;
  url: string;
  description?: string;
  params: Readonly<Record<string, unknown>>;
  toc: TocItem[];
}

export function buildSiteModel(config: SiteConfig): SiteModel {
  return {
    title: config.title,
    author: config.author,
    language: config.language,
    base_url: config.base_url,
    theme_rtl: config.theme_rtl,
    theme_inverted: config.theme_inverted,
    analytics_id: config.analytics_id,
    custom_stylesheets: [...config.custom_stylesheets],
    title_format: config.title_format,
    toc: config.toc,
    feed: config.feed,
    params: config.params,
  };
}
