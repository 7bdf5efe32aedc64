import { mkdir, rm, writeFile } from "fs/promises";
import { dirname, isAbsolute, relative, resolve, sep } from "path";
import type { SiteConfig } from "../config";
import { parseDocument } from "../content/frontmatter";
import { walkContent } from "../content/load";
import type { Document } from "../content/model";
import { ConfigError, IOError, ParseError } from "../errors";
import { renderMarkdown } from "../presentation/markdown";
import { buildSiteModel, type PageModel, type SiteModel } from "../presentation/model";
import type { TocItem } from "../presentation/structured-content";
import {
  composeFeed,
  composeIndex,
  composePage,
  createTemplateEnv,
  resolveTemplateDir,
} from "../presentation/template";
import { findMissingTemplateVariables, renderTemplateString } from "../variables";
import { formatDocumentFailure, formatMissingVariableWarning, formatSkippedFileWarning } from "../warn";
import { collectAssets, writeAsset } from "./assets";
import { OutputPlan } from "./output-plan";

export const INDEX_PATH = "index.html";
export const FEED_PATH = "index.xml";

export interface BuildSiteOptions {
  /** Site directory; content, static files and custom stylesheets resolve against it */
  rootDir: string;
  config: SiteConfig;
  /** Directory holding template folders. Defaults to the site's templates/ or the built-in ones */
  templateDir?: string;
  /** Overrides config.output_dir, e.g. from the command line */
  outputDir?: string;
  /** Remove the output directory before writing */
  clean?: boolean;
}

export interface DocumentFailure {
  path: string;
  reason: string;
  error: ParseError;
}

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface BuildReport {
  outputDir: string;
  /** Output paths relative to outputDir */
  written: string[];
  failures: DocumentFailure[];
  skipped: SkippedFile[];
  drafts: string[];
}

interface PlannedPage {
  document: Document;
  outputPath: string;
}

const PERMALINK_KEYS = { slug: "", section: "", year: "", month: "", day: "" };

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function warnMissingVariables(context: string, missing: string[]): void {
  if (missing.length === 0) return;
  console.warn(formatMissingVariableWarning(context, missing));
}

export function permalinkVariables(document: Document): Record<string, string> {
  const { date } = document.metadata;
  return {
    slug: document.slug,
    section: document.slug.split("/")[0] ?? "",
    year: String(date.getUTCFullYear()),
    month: pad(date.getUTCMonth() + 1),
    day: pad(date.getUTCDate()),
  };
}

/** Output path of a document, relative to the output directory. */
export function outputPathFor(document: Document, permalink: string): string {
  let rendered: string;
  try {
    rendered = renderTemplateString(permalink, permalinkVariables(document)).trim();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot render permalink "${permalink}" for ${document.relativePath}: ${reason}`, [], {
      cause: err,
    });
  }
  return rendered.replace(/^\/+/, "");
}

export function pageUrl(baseUrl: string, outputPath: string): string {
  return `${baseUrl}${outputPath.replace(/(^|\/)index\.html$/, "$1")}`;
}

function toPageModel(document: Document, outputPath: string, site: SiteModel, toc: TocItem[]): PageModel {
  const { metadata } = document;
  return {
    title: metadata.title,
    date: metadata.date,
    dateIso: metadata.date.toISOString(),
    slug: document.slug,
    url: pageUrl(site.base_url, outputPath),
    description: metadata.description,
    params: metadata.params,
    toc,
  };
}

/** Newest first; equal dates fall back to slug order so the listing is stable. */
export function byDateDescending(a: PageModel, b: PageModel): number {
  const diff = b.date.getTime() - a.date.getTime();
  if (diff !== 0) return diff;
  if (a.slug === b.slug) return 0;
  return a.slug < b.slug ? -1 : 1;
}

async function writeOutput(outputDir: string, outputPath: string, contents: string): Promise<void> {
  const target = resolve(outputDir, outputPath);
  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, contents);
  } catch (err) {
    throw new IOError(target, err, "write");
  }
}

/** True when `child` is `parent` or lies below it. */
function isWithin(parent: string, child: string): boolean {
  const fromParent = relative(parent, child);
  return fromParent === "" || (fromParent !== ".." && !fromParent.startsWith(`..${sep}`) && !isAbsolute(fromParent));
}

/** The output directory may not hold, or sit inside, anything the build reads. */
export function assertSeparateOutputDir(outputDir: string, sources: Array<{ label: string; path: string }>): void {
  for (const source of sources) {
    if (isWithin(outputDir, source.path) || isWithin(source.path, outputDir)) {
      throw new ConfigError(`Output directory ${outputDir} overlaps the ${source.label} ${source.path}`);
    }
  }
}

/**
 * Build the whole site: every non-draft document becomes one page, plus the
 * index, the feed and the assets. Per-document parse failures are collected in
 * the report; collisions, template and config errors abort before anything is
 * written.
 */
export async function buildSite(opts: BuildSiteOptions): Promise<BuildReport> {
  const { config } = opts;
  const rootDir = resolve(opts.rootDir);
  const contentDir = resolve(rootDir, config.content_dir);
  const outputDir = resolve(rootDir, opts.outputDir ?? config.output_dir);
  const templateDir = opts.templateDir ?? resolveTemplateDir(rootDir, config.template);

  assertSeparateOutputDir(outputDir, [
    { label: "content directory", path: contentDir },
    { label: "static directory", path: resolve(rootDir, config.static_dir) },
    { label: "site templates", path: resolve(rootDir, "templates") },
    { label: "template", path: resolve(templateDir, config.template) },
    ...config.custom_stylesheets.map((stylesheet) => ({
      label: "custom stylesheet",
      path: resolve(rootDir, stylesheet),
    })),
  ]);
  if (isWithin(outputDir, rootDir)) {
    throw new ConfigError(`Output directory ${outputDir} contains the site directory ${rootDir}`);
  }

  const documents: Document[] = [];
  const failures: DocumentFailure[] = [];
  const skipped: SkippedFile[] = [];
  const drafts: string[] = [];

  for await (const entry of walkContent(contentDir)) {
    if (entry.kind === "unreadable") {
      const reason = entry.error.cause instanceof Error ? entry.error.cause.message : entry.error.message;
      console.warn(formatSkippedFileWarning(entry.relativePath, reason));
      skipped.push({ path: entry.relativePath, reason });
      continue;
    }

    let document: Document;
    try {
      document = parseDocument(entry);
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      console.error(formatDocumentFailure(err.path, err.reason));
      failures.push({ path: err.path, reason: err.reason, error: err });
      continue;
    }

    if (document.metadata.draft) {
      drafts.push(document.relativePath);
      continue;
    }
    documents.push(document);
  }

  warnMissingVariables("permalink", findMissingTemplateVariables(config.permalink, PERMALINK_KEYS));

  const plan = new OutputPlan();
  const planned: PlannedPage[] = documents.map((document) => ({
    document,
    outputPath: plan.claim(outputPathFor(document, config.permalink), document.relativePath),
  }));
  plan.claim(INDEX_PATH, "(site index)");
  if (config.feed) {
    plan.claim(FEED_PATH, "(feed)");
  }
  const assets = await collectAssets({ rootDir, config, templateDir });
  for (const asset of assets) {
    plan.claim(asset.outputPath, asset.source);
  }

  // Render everything before touching the output directory.
  const env = createTemplateEnv(templateDir, config.template, config.language);
  const site = buildSiteModel(config);
  const outputs = new Map<string, string>();
  const pages: PageModel[] = [];

  for (const { document, outputPath } of planned) {
    const fragment = renderMarkdown(document.body);
    const page = toPageModel(document, outputPath, site, fragment.toc);
    outputs.set(outputPath, composePage(env, fragment, page, site));
    pages.push(page);
  }

  pages.sort(byDateDescending);
  outputs.set(INDEX_PATH, composeIndex(env, pages, site));
  if (config.feed) {
    outputs.set(FEED_PATH, composeFeed(env, pages, site));
  }

  if (opts.clean) {
    try {
      await rm(outputDir, { recursive: true, force: true });
    } catch (err) {
      throw new IOError(outputDir, err, "write");
    }
  }

  // Every path has exactly one producer in the plan.
  await Promise.all([
    ...Array.from(outputs, ([outputPath, html]) => writeOutput(outputDir, outputPath, html)),
    ...assets.map((asset) => writeAsset(asset, outputDir)),
  ]);

  return {
    outputDir,
    written: plan.paths(),
    failures,
    skipped,
    drafts,
  };
}
