const INDEX_NAMES = new Set(["index", "_index"]);

export function slugify(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/<[^>]+>/g, "")
    .replace(/[_.]+/g, " ")
    .replace(/[^a-z0-9\s-]/g, "")
    .trim()
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");
}

/**
 * Slug of a content file: its relative path without extension, minus a trailing
 * `index`/`_index` segment. A front-matter slug replaces the last segment.
 */
export function deriveSlug(relativePath: string, override?: string): string {
  const segments = relativePath.replace(/\.[^./]+$/, "").split("/");
  const last = segments.at(-1);
  if (last !== undefined && INDEX_NAMES.has(last.toLowerCase())) {
    segments.pop();
  }

  if (override) {
    segments.pop();
    segments.push(...override.split("/"));
  }

  return segments
    .map((segment) => slugify(segment))
    .filter((segment) => segment.length > 0)
    .join("/");
}
