import { posix } from "path";
import { CollisionError, ConfigError } from "../errors";

/** Normalise a `/`-separated output path; reject absolute paths and paths leaving the output directory. */
export function normalizeOutputPath(outputPath: string): string {
  const normalized = posix.normalize(outputPath.replace(/\\/g, "/"));
  if (
    normalized.startsWith("/") ||
    normalized === "." ||
    normalized === ".." ||
    normalized.startsWith("../") ||
    normalized.endsWith("/")
  ) {
    throw new ConfigError(`Output path "${outputPath}" must be a file path inside the output directory`);
  }
  return normalized;
}

function parentDirs(outputPath: string): string[] {
  const segments = outputPath.split("/");
  return segments.slice(1).map((_segment, index) => segments.slice(0, index + 1).join("/"));
}

/**
 * Map from output path to the one source that produces it. Claiming a path
 * twice, or a path that another claim needs as a directory, is a
 * CollisionError naming both sources.
 */
export class OutputPlan {
  private readonly owners = new Map<string, string>();
  /** Directory implied by a claimed path, mapped to the first source that needs it */
  private readonly dirs = new Map<string, string>();

  claim(outputPath: string, source: string): string {
    const normalized = normalizeOutputPath(outputPath);
    const owner = this.owners.get(normalized) ?? this.dirs.get(normalized);
    if (owner !== undefined) {
      throw new CollisionError(normalized, owner, source);
    }

    const parents = parentDirs(normalized);
    for (const dir of parents) {
      const fileOwner = this.owners.get(dir);
      if (fileOwner !== undefined) {
        throw new CollisionError(dir, fileOwner, source);
      }
    }

    this.owners.set(normalized, source);
    for (const dir of parents) {
      if (!this.dirs.has(dir)) {
        this.dirs.set(dir, source);
      }
    }
    return normalized;
  }

  paths(): string[] {
    return Array.from(this.owners.keys()).sort();
  }
}
