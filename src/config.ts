import { existsSync } from "fs";
import { isAbsolute, normalize, resolve } from "path";
import { pathToFileURL } from "url";
import { z } from "zod";
import { ConfigError } from "./errors";
import { findTemplateSyntaxError } from "./variables";

function isContainedRelativePath(value: string): boolean {
  if (isAbsolute(value)) return false;
  const normalized = normalize(value);
  return normalized !== ".." && !normalized.startsWith("../") && !normalized.startsWith("..\\");
}

const templateString = z
  .string()
  .min(1)
  .superRefine((value, ctx) => {
    const problem = findTemplateSyntaxError(value);
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid template: ${problem}` });
    }
  });

const relativePath = z
  .string()
  .min(1)
  .refine(isContainedRelativePath, { message: "must be a relative path inside the site directory" });

export const siteConfigSchema = z
  .object({
    /** Site display name */
    title: z.string().min(1).default("Untitled"),
    author: z.string().default(""),
    /** Locale tag used for `<html lang>` and month names */
    language: z.string().min(1).default("en"),
    /** Include the right-to-left stylesheet and set `dir="rtl"` */
    theme_rtl: z.boolean().default(false),
    /** Include the inverted colour scheme stylesheet */
    theme_inverted: z.boolean().default(false),
    analytics_id: z.string().min(1).optional(),
    /** Extra stylesheets, linked after the template's own, in this order */
    custom_stylesheets: z.array(relativePath).default([]),
    base_url: z
      .string()
      .default("/")
      .transform((value) => (value.endsWith("/") ? value : `${value}/`)),
    content_dir: relativePath.default("content"),
    output_dir: relativePath.default("public"),
    static_dir: relativePath.default("static"),
    /** Template folder name from templates/ */
    template: z.string().regex(/^[\w-]+$/, "must be a template folder name").default("default"),
    /** Output path of each page. Variables: slug, section, year, month, day */
    permalink: templateString.default("{{ slug }}/index.html"),
    /** `<title>` of each page. Variables: title, site */
    title_format: templateString.default("{{ title }}"),
    toc: z.boolean().default(false),
    feed: z.boolean().default(true),
    /** Free-form values exposed to templates as site.params */
    params: z.record(z.unknown()).default({}),
  })
  .strict();

export type SiteConfigInput = z.input<typeof siteConfigSchema>;
export type SiteConfig = z.output<typeof siteConfigSchema>;

/** Identity helper for type-safe config files */
export function defineConfig(config: SiteConfigInput): SiteConfigInput {
  return config;
}

export const CONFIG_FILENAME = "folio.config.ts";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Load the raw config object from a site directory, returns empty config if the file doesn't exist */
export async function loadConfig(cwd: string): Promise<Record<string, unknown>> {
  const configPath = resolve(cwd, CONFIG_FILENAME);
  if (!existsSync(configPath)) {
    return {};
  }

  let mod: { default?: unknown };
  try {
    // Cache-bust dynamic import so config edits apply during watch sessions.
    const cacheBust = `${Date.now()}${Math.random().toString(36).slice(2)}`;
    const configUrl = `${pathToFileURL(configPath).href}?v=${cacheBust}`;
    mod = await import(configUrl);
  } catch (err) {
    throw new ConfigError(`Failed to load ${configPath}`, [], { cause: err });
  }

  const config = mod.default ?? {};
  if (!isRecord(config)) {
    throw new ConfigError(`${configPath} must export a config object as default`);
  }
  return config;
}

/** Validate a raw config object, with command line overrides applied on top */
export function resolveSiteConfig(
  raw: Record<string, unknown>,
  overrides: Partial<SiteConfigInput> = {}
): SiteConfig {
  const merged: Record<string, unknown> = { ...raw };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const result = siteConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const key = issue.path.length > 0 ? issue.path.join(".") : "(config)";
      return `${key}: ${issue.message}`;
    });
    throw new ConfigError("Invalid site configuration", issues);
  }
  return result.data;
}

export async function loadSiteConfig(
  siteDir: string,
  overrides: Partial<SiteConfigInput> = {}
): Promise<SiteConfig> {
  const raw = await loadConfig(siteDir);
  return resolveSiteConfig(raw, overrides);
}
