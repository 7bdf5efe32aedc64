import pc from "picocolors";
import type { FolioError } from "./errors";

const TAG = "[folio]";

export function formatMissingVariableWarning(context: string, missing: string[]): string {
  const header = pc.yellow(pc.bold(`⚠️ ${TAG} Missing template variables in ${context} (${missing.length})`));
  const lines = missing.map((item) => pc.yellow(`  - ${item}`)).join("\n");
  return `${header}\n${lines}`;
}

export function formatSkippedFileWarning(relativePath: string, reason: string): string {
  return pc.yellow(`⚠️ ${TAG} Skipped unreadable file ${relativePath}: ${reason}`);
}

export function formatDocumentFailure(relativePath: string, reason: string): string {
  return pc.red(`✖ ${TAG} ${relativePath}: ${reason}`);
}

export function formatFatalError(error: FolioError): string {
  return `${pc.red(pc.bold(`✖ ${TAG} Build aborted (${error.code})`))}\n${pc.red(error.message)}`;
}

export interface BuildSummary {
  outputDir: string;
  written: number;
  drafts: number;
  skipped: number;
  failures: Array<{ path: string; reason: string }>;
}

export function formatBuildSummary(summary: BuildSummary): string {
  const counts = `${summary.written} file(s) written to ${summary.outputDir}, ${summary.drafts} draft(s) excluded, ${summary.skipped} file(s) skipped`;

  if (summary.failures.length === 0) {
    return pc.green(`✔ ${TAG} ${counts}`);
  }

  const header = pc.red(pc.bold(`✖ ${TAG} ${summary.failures.length} document(s) failed; ${counts}`));
  const lines = summary.failures.map((failure) => pc.red(`  - ${failure.path}: ${failure.reason}`)).join("\n");
  return `${header}\n${lines}`;
}
