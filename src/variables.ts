import nunjucks from "nunjucks";

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}(?:T[\d:.]+(?:Z|[+-]\d{2}:\d{2})?)?$/;

function parseIsoDate(value: string): Date | null {
  if (!ISO_DATE_RE.test(value)) return null;
  const date = new Date(value.length === 10 ? `${value}T00:00:00Z` : value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export interface TemplateEnvOptions {
  /** Locale tag for month names, e.g. "en" or "nl-NL" */
  dateLocale?: string;
  autoescape?: boolean;
}

const INTERPOLATION_RE = /\{\{\s*([^}]+)\s*\}\}/g;
const KEYWORDS = new Set([
  "true",
  "false",
  "null",
  "undefined",
  "and",
  "or",
  "not",
  "in",
  "if",
  "else",
]);

function extractVariablePaths(expr: string): string[] {
  const paths = new Set<string>();
  const primary = expr.split("|")[0]?.trim();
  if (primary && /^[A-Za-z_][\w.]*$/.test(primary) && !KEYWORDS.has(primary)) {
    paths.add(primary);
  }

  // Strip string literals so identifiers inside quotes are ignored.
  let sanitized = expr.replace(/(['"`])(?:\\.|(?!\1).)*\1/g, "");
  // Strip filter names after pipes, but keep filter arguments.
  sanitized = sanitized.replace(/\|\s*([A-Za-z_]\w*)/g, "|");

  const tokens = sanitized.match(/[A-Za-z_][\w]*(?:\.[A-Za-z_][\w]*)*/g) ?? [];
  for (const token of tokens) {
    if (!KEYWORDS.has(token)) {
      paths.add(token);
    }
  }

  return Array.from(paths);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function getValueAtPath(values: Record<string, unknown>, path: string): unknown {
  let current: unknown = values;
  for (const part of path.split(".")) {
    if (!isRecord(current) || !(part in current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

export function hasValueAtPath(values: Record<string, unknown>, path: string): boolean {
  return getValueAtPath(values, path) !== undefined;
}

function monthName(date: Date, locale: string, month: "long" | "short"): string {
  try {
    return new Intl.DateTimeFormat(locale, { month, timeZone: "UTC" }).format(date);
  } catch {
    // Unknown locale tag.
    return new Intl.DateTimeFormat("en", { month, timeZone: "UTC" }).format(date);
  }
}

/** Format a date with YYYY YY MMMM MMM MM M DD D tokens, in UTC. */
export function formatDate(date: Date, format: string, locale = "en"): string {
  const replacements: Record<string, string> = {
    YYYY: String(date.getUTCFullYear()),
    YY: String(date.getUTCFullYear()).slice(-2),
    MMMM: monthName(date, locale, "long"),
    MMM: monthName(date, locale, "short"),
    MM: pad(date.getUTCMonth() + 1),
    M: String(date.getUTCMonth() + 1),
    DD: pad(date.getUTCDate()),
    D: String(date.getUTCDate()),
  };

  return format.replace(/YYYY|YY|MMMM|MMM|MM|M|DD|D/g, (token) => replacements[token] ?? token);
}

type TemplateLoader = ConstructorParameters<typeof nunjucks.Environment>[0];

export function createTemplateEnvironment(
  loader?: TemplateLoader,
  options?: TemplateEnvOptions
): nunjucks.Environment {
  const env = new nunjucks.Environment(loader ?? null, {
    autoescape: options?.autoescape ?? false,
  });
  const locale = options?.dateLocale ?? "en";

  env.addFilter("format", (value: unknown, outputFormat = "YYYY-MM-DD") => {
    let date: Date | null = value instanceof Date ? value : null;
    if (!date && typeof value === "string") {
      date = parseIsoDate(value);
    }

    if (!date || Number.isNaN(date.getTime())) {
      return String(value ?? "");
    }

    return formatDate(date, String(outputFormat), locale);
  });

  return env;
}

export function findMissingTemplateVariables(
  template: string,
  variables: Record<string, unknown>
): string[] {
  const missing = new Set<string>();
  for (const match of template.matchAll(INTERPOLATION_RE)) {
    for (const path of extractVariablePaths(match[1] ?? "")) {
      if (!hasValueAtPath(variables, path)) {
        missing.add(path);
      }
    }
  }
  return Array.from(missing).sort();
}

/** First problem found when compiling a template string, or null when it compiles. */
export function findTemplateSyntaxError(template: string): string | null {
  try {
    new nunjucks.Template(template, createTemplateEnvironment(), undefined, true);
    return null;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    const details = message
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith("(unknown path)"));
    return details.length > 0 ? details.join(" ") : message;
  }
}

export function renderTemplateString(
  template: string,
  variables: Record<string, unknown>,
  options?: TemplateEnvOptions
): string {
  const env = createTemplateEnvironment(undefined, options);
  return env.renderString(template, variables);
}
