export type FolioErrorCode = "IO" | "PARSE" | "TEMPLATE" | "COLLISION" | "CONFIG";

export class FolioError extends Error {
  readonly code: FolioErrorCode;

  constructor(code: FolioErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}

/** A file or directory could not be read, or an output could not be written. */
export class IOError extends FolioError {
  readonly path: string;

  constructor(path: string, cause: unknown, operation: "read" | "write" = "read") {
    super("IO", `Cannot ${operation} ${path}: ${describeCause(cause)}`, { cause });
    this.path = path;
  }
}

/** Malformed metadata block or a missing required key; fatal for one document only. */
export class ParseError extends FolioError {
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super("PARSE", `${path}: ${reason}`, options);
    this.path = path;
    this.reason = reason;
  }
}

/** The page shell could not be rendered. Indicates a bug or a broken template, never bad content. */
export class TemplateError extends FolioError {
  readonly template: string;

  constructor(template: string, reason: string, options?: { cause?: unknown }) {
    super("TEMPLATE", `Template "${template}": ${reason}`, options);
    this.template = template;
  }
}

export class CollisionError extends FolioError {
  readonly outputPath: string;
  readonly sources: readonly [string, string];

  constructor(outputPath: string, first: string, second: string) {
    super(
      "COLLISION",
      `Multiple source files resolve to the same output "${outputPath}": ${first}, ${second}`
    );
    this.outputPath = outputPath;
    this.sources = [first, second];
  }
}

export class ConfigError extends FolioError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super("CONFIG", issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message, options);
    this.issues = issues;
  }
}
