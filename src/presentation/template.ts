import { existsSync } from "fs";
import { readFile } from "fs/promises";
import nunjucks from "nunjucks";
import { resolve } from "path";
import { fileURLToPath } from "url";
import { ConfigError, TemplateError } from "../errors";
import { createTemplateEnvironment, getValueAtPath, renderTemplateString } from "../variables";
import type { RenderedMarkdown } from "./markdown";
import type { PageModel, SiteModel } from "./model";

export const BUILTIN_TEMPLATE_DIR = fileURLToPath(new URL("../../templates", import.meta.url));

export const LAYOUTS = {
  single: "single.njk",
  list: "list.njk",
  feed: "rss.njk",
} as const;

const MANDATORY_PAGE_SLOTS = ["page.title", "content"] as const;

/** Site-local templates/ wins over the built-in templates when it has the requested template. */
export function resolveTemplateDir(siteDir: string, templateName: string): string {
  const localDir = resolve(siteDir, "templates");
  if (existsSync(resolve(localDir, templateName))) {
    return localDir;
  }
  return BUILTIN_TEMPLATE_DIR;
}

export async function loadTemplateCss(
  templateDir: string,
  templateName: string,
  fileName = "style.css",
  stack: string[] = []
): Promise<string> {
  if (stack.includes(templateName)) {
    const chain = [...stack, templateName].join(" -> ");
    throw new TemplateError(fileName, `CSS inheritance cycle detected: ${chain}`);
  }

  const stylePath = resolve(templateDir, templateName, fileName);
  if (!existsSync(stylePath)) {
    if (stack.length > 0) {
      throw new TemplateError(fileName, `'${templateName}' is missing ${fileName} required by @extends`);
    }
    return "";
  }

  const css = await readFile(stylePath, "utf8");
  const extendsMatch = css.match(/^\/\*\s*@extends\s+([\w-]+)\s*\*\//);

  if (!extendsMatch) {
    return css;
  }

  const parentName = extendsMatch[1];
  if (!parentName) {
    return css;
  }
  const parentCss = await loadTemplateCss(templateDir, parentName, fileName, [...stack, templateName]);
  const childCss = css.replace(/^\/\*\s*@extends\s+[\w-]+\s*\*\/\n?/, "");
  return `${parentCss}\n${childCss}`;
}

export function createTemplateEnv(
  templateDir: string,
  templateName: string,
  language = "en"
): nunjucks.Environment {
  const templatePath = resolve(templateDir, templateName);
  return createTemplateEnvironment(new nunjucks.FileSystemLoader(templatePath), {
    dateLocale: language,
    autoescape: true,
  });
}

function renderLayout(env: nunjucks.Environment, layout: string, data: Record<string, unknown>): string {
  try {
    return env.render(layout, data);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new TemplateError(layout, reason, { cause: err });
  }
}

/** The `<title>` text of a page, from the site's title_format. */
export function resolvePageTitle(page: Pick<PageModel, "title">, site: SiteModel): string {
  try {
    return renderTemplateString(site.title_format, { title: page.title, site: site.title }).trim();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot render title_format "${site.title_format}": ${reason}`, [], { cause: err });
  }
}

/** Wrap a rendered fragment in the page shell. */
export function composePage(
  env: nunjucks.Environment,
  fragment: RenderedMarkdown,
  page: PageModel,
  site: SiteModel
): string {
  const data: Record<string, unknown> = {
    site,
    page: { ...page, toc: fragment.toc },
    content: fragment.html,
  };

  for (const slot of MANDATORY_PAGE_SLOTS) {
    const value = getValueAtPath(data, slot);
    if (typeof value !== "string" || (slot === "page.title" && value.trim().length === 0)) {
      throw new TemplateError(LAYOUTS.single, `mandatory slot "${slot}" is not bound`);
    }
  }

  data.title = resolvePageTitle(page, site) || page.title;
  return renderLayout(env, LAYOUTS.single, data);
}

/** The site index: every published page, in the order given. */
export function composeIndex(env: nunjucks.Environment, pages: PageModel[], site: SiteModel): string {
  return renderLayout(env, LAYOUTS.list, { site, pages, title: site.title });
}

/** RSS feed over the pages in the order given; the newest date is the build date. */
export function composeFeed(env: nunjucks.Environment, pages: PageModel[], site: SiteModel): string {
  const lastBuildDate = pages.reduce<Date | undefined>(
    (latest, page) => (!latest || page.date > latest ? page.date : latest),
    undefined
  );
  return renderLayout(env, LAYOUTS.feed, { site, pages, lastBuildDate });
}
