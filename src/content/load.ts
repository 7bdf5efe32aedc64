import type { Dirent } from "fs";
import { readdir, readFile } from "fs/promises";
import { extname, join, resolve } from "path";
import { IOError } from "../errors";
import type { ContentEntry } from "./model";

export const MARKDOWN_EXTENSIONS = new Set([".md", ".markdown"]);

function byName(a: Dirent, b: Dirent): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

async function readSortedDir(dir: string): Promise<Dirent[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries.filter((entry) => !entry.name.startsWith(".")).sort(byName);
}

function isMarkdownEntry(entry: Dirent): boolean {
  if (!entry.isFile() && !entry.isSymbolicLink()) return false;
  return MARKDOWN_EXTENSIONS.has(extname(entry.name).toLowerCase());
}

async function* walkEntries(
  root: string,
  prefix: string,
  entries: Dirent[]
): AsyncGenerator<ContentEntry> {
  for (const entry of entries) {
    const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;
    const path = join(root, relativePath);

    if (entry.isDirectory()) {
      let children: Dirent[];
      try {
        children = await readSortedDir(path);
      } catch (err) {
        yield { kind: "unreadable", path, relativePath, error: new IOError(path, err) };
        continue;
      }
      yield* walkEntries(root, relativePath, children);
      continue;
    }

    if (!isMarkdownEntry(entry)) {
      continue;
    }

    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (err) {
      yield { kind: "unreadable", path, relativePath, error: new IOError(path, err) };
      continue;
    }
    yield { kind: "file", path, relativePath, raw };
  }
}

/**
 * Lazily walk a content tree, yielding every Markdown file in path order.
 * Files and sub-directories that cannot be read are yielded as `unreadable`
 * entries; only an unreadable root throws.
 */
export async function* walkContent(contentDir: string): AsyncGenerator<ContentEntry> {
  const root = resolve(contentDir);
  let entries: Dirent[];
  try {
    entries = await readSortedDir(root);
  } catch (err) {
    throw new IOError(root, err);
  }
  yield* walkEntries(root, "", entries);
}

/** List every file below `dir` as sorted `/`-separated relative paths. A missing directory is empty. */
export async function listFiles(dir: string): Promise<string[]> {
  const root = resolve(dir);
  const files: string[] = [];

  const visit = async (prefix: string): Promise<void> => {
    const path = prefix ? join(root, prefix) : root;
    let entries: Dirent[];
    try {
      entries = await readSortedDir(path);
    } catch (err) {
      if (!prefix && err instanceof Error && "code" in err && err.code === "ENOENT") {
        return;
      }
      throw new IOError(path, err);
    }

    for (const entry of entries) {
      const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        await visit(relativePath);
      } else if (entry.isFile()) {
        files.push(relativePath);
      }
    }
  };

  await visit("");
  return files;
}
