import type { IOError } from "../errors";

export interface SourceFile {
  /** Absolute path */
  path: string;
  /** Path relative to the content directory, always `/`-separated */
  relativePath: string;
  raw: string;
}

export type ContentEntry =
  | ({ kind: "file" } & SourceFile)
  | { kind: "unreadable"; path: string; relativePath: string; error: IOError };

export interface DocumentMetadata {
  readonly title: string;
  readonly date: Date;
  readonly draft: boolean;
  readonly slug?: string;
  readonly description?: string;
  /** Every other front-matter key */
  readonly params: Readonly<Record<string, unknown>>;
}

export interface Document {
  readonly sourcePath: string;
  readonly relativePath: string;
  readonly slug: string;
  readonly metadata: DocumentMetadata;
  readonly body: string;
}
