import matter from "gray-matter";
import YAML from "yaml";
import { ParseError } from "../errors";
import type { Document, DocumentMetadata, SourceFile } from "./model";
import { deriveSlug } from "./slug";

const DELIMITER_LINE_RE = /^---[ \t]*$/;

// Date-only, or date-time with optional seconds, fraction and zone.
const ISO_8601_RE =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:\d{2})?)?$/;

// YAML 1.2 core schema: dates stay strings and are validated here. The parsed
// value is boxed because gray-matter only accepts objects from an engine.
const METADATA_ENGINES = {
  yaml: (input: string): object => ({ metadata: YAML.parse(input) }),
};

const KNOWN_KEYS = new Set(["title", "date", "draft", "slug", "description"]);

export interface SplitFrontmatter {
  data: Record<string, unknown>;
  body: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Split a raw file into its `---` delimited YAML metadata block and the body after it. */
export function splitFrontmatter(raw: string, path: string): SplitFrontmatter {
  const source = raw.startsWith("\uFEFF") ? raw.slice(1) : raw;
  const lines = source.split(/\r?\n/);

  if (!DELIMITER_LINE_RE.test(lines[0] ?? "")) {
    throw new ParseError(path, "missing metadata block");
  }
  if (!lines.slice(1).some((line) => DELIMITER_LINE_RE.test(line))) {
    throw new ParseError(path, "metadata block is not terminated");
  }

  let parsed: matter.GrayMatterFile<string>;
  try {
    // Passing options keeps gray-matter from serving a cached result.
    parsed = matter(source, { excerpt: false, engines: METADATA_ENGINES });
  } catch (err) {
    const reason = err instanceof Error ? (err.message.split("\n")[0] ?? err.message) : String(err);
    throw new ParseError(path, `invalid metadata: ${reason}`, { cause: err });
  }

  // gray-matter skips the engine for a block with nothing but comments.
  const data: unknown = isRecord(parsed.data) && "metadata" in parsed.data ? parsed.data.metadata : {};
  if (!isRecord(data)) {
    throw new ParseError(path, "metadata must be a mapping");
  }

  return { data, body: parsed.content };
}

function isCalendarDay(day: string): boolean {
  const midnight = new Date(`${day}T00:00:00Z`);
  return !Number.isNaN(midnight.getTime()) && midnight.toISOString().slice(0, 10) === day;
}

function parseDate(value: unknown, path: string): Date | null {
  if (typeof value !== "string") {
    return null;
  }
  const match = value.trim().match(ISO_8601_RE);
  if (!match) {
    return null;
  }
  const [, day, time, zone] = match;
  if (day === undefined || !isCalendarDay(day)) {
    throw new ParseError(path, `"date" is not a valid calendar date: ${value.trim()}`);
  }
  // Timestamps without a zone are read as UTC, like YAML timestamps.
  const date = new Date(time ? `${day}T${time}${zone ?? "Z"}` : `${day}T00:00:00Z`);
  return Number.isNaN(date.getTime()) ? null : date;
}

function optionalString(
  data: Record<string, unknown>,
  key: string,
  path: string,
  allowEmpty: boolean
): string | undefined {
  const value = data[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string" || (!allowEmpty && value.trim().length === 0)) {
    throw new ParseError(path, allowEmpty ? `"${key}" must be a string` : `"${key}" must be a non-empty string`);
  }
  return allowEmpty ? value : value.trim();
}

/** Validate front-matter into document metadata. Required: title, date. */
export function parseMetadata(data: Record<string, unknown>, path: string): DocumentMetadata {
  const { title, date: rawDate } = data;
  if (title === undefined || title === null) {
    throw new ParseError(path, 'missing required key "title"');
  }
  if (typeof title !== "string" || title.trim().length === 0) {
    throw new ParseError(path, '"title" must be a non-empty string');
  }

  if (rawDate === undefined || rawDate === null) {
    throw new ParseError(path, 'missing required key "date"');
  }
  const date = parseDate(rawDate, path);
  if (!date) {
    throw new ParseError(path, '"date" must be an ISO-8601 timestamp');
  }

  const draft = data.draft ?? false;
  if (typeof draft !== "boolean") {
    throw new ParseError(path, '"draft" must be a boolean');
  }

  const params: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_KEYS.has(key)) {
      params[key] = value;
    }
  }

  return {
    title: title.trim(),
    date,
    draft,
    slug: optionalString(data, "slug", path, false),
    description: optionalString(data, "description", path, true),
    params,
  };
}

/** Turn a loaded source file into an immutable Document, or throw ParseError. */
export function parseDocument(file: SourceFile): Document {
  const { data, body } = splitFrontmatter(file.raw, file.relativePath);
  const metadata = parseMetadata(data, file.relativePath);
  return Object.freeze({
    sourcePath: file.path,
    relativePath: file.relativePath,
    slug: deriveSlug(file.relativePath, metadata.slug),
    metadata: Object.freeze(metadata),
    body,
  });
}
