import { resolve } from "path";
import pc from "picocolors";
import { parseArgs } from "util";
import { CONFIG_FILENAME, loadSiteConfig, type SiteConfig, type SiteConfigInput } from "./config";
import { FolioError } from "./errors";
import { resolveTemplateDir } from "./presentation/template";
import { buildSite, type BuildReport } from "./renderers/site";
import { formatBuildSummary, formatFatalError } from "./warn";
import { startWatch } from "./watch";

export const USAGE = `Usage:
  folio build [site-dir] [--output dir] [--template name] [--base-url url] [--rtl] [--inverted] [--clean]
  folio watch [site-dir] [--output dir] [--template name] [--base-url url] [--rtl] [--inverted]`;

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      output: { type: "string", short: "o" },
      template: { type: "string" },
      "base-url": { type: "string" },
      rtl: { type: "boolean" },
      inverted: { type: "boolean" },
      clean: { type: "boolean" },
    },
    allowPositionals: true,
  });
}

interface BuildInvocation {
  siteDir: string;
  overrides: Partial<SiteConfigInput>;
  /** Absolute output directory from --output */
  outputDir?: string;
  clean: boolean;
}

export function summarizeReport(report: BuildReport) {
  return {
    outputDir: report.outputDir,
    written: report.written.length,
    drafts: report.drafts.length,
    skipped: report.skipped.length,
    failures: report.failures.map(({ path, reason }) => ({ path, reason })),
  };
}

async function buildOnce(invocation: BuildInvocation, config: SiteConfig): Promise<BuildReport> {
  console.log(`Building ${pc.bold(config.title)} from ${invocation.siteDir}`);
  const report = await buildSite({
    rootDir: invocation.siteDir,
    config,
    outputDir: invocation.outputDir,
    clean: invocation.clean,
  });
  console.log(formatBuildSummary(summarizeReport(report)));
  return report;
}

async function runBuild(invocation: BuildInvocation): Promise<number> {
  try {
    const config = await loadSiteConfig(invocation.siteDir, invocation.overrides);
    const report = await buildOnce(invocation, config);
    return report.failures.length > 0 ? 1 : 0;
  } catch (err) {
    if (!(err instanceof FolioError)) throw err;
    console.error(formatFatalError(err));
    return 1;
  }
}

/** Paths whose changes trigger a rebuild under the given config. */
export function watchedPaths(siteDir: string, config: SiteConfig): string[] {
  const templateDir = resolveTemplateDir(siteDir, config.template);
  return [
    resolve(siteDir, CONFIG_FILENAME),
    resolve(siteDir, config.content_dir),
    resolve(siteDir, config.static_dir),
    resolve(templateDir, config.template),
    ...config.custom_stylesheets.map((stylesheet) => resolve(siteDir, stylesheet)),
  ];
}

async function runWatch(invocation: BuildInvocation): Promise<number> {
  let paths = [resolve(invocation.siteDir, CONFIG_FILENAME)];

  const handle = await startWatch({
    rebuild: async () => {
      try {
        const config = await loadSiteConfig(invocation.siteDir, invocation.overrides);
        paths = watchedPaths(invocation.siteDir, config);
        await buildOnce(invocation, config);
      } catch (err) {
        if (!(err instanceof FolioError)) throw err;
        console.error(formatFatalError(err));
      }
      return paths;
    },
  });

  console.log(pc.dim("Watching for changes. Press Ctrl-C to stop."));
  await new Promise<void>((done) => {
    process.once("SIGINT", () => {
      handle.close();
      done();
    });
  });
  return 0;
}

/** Run the command line and return the exit status. */
export async function runCli(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  const [command, target] = positionals;

  if (!command) {
    console.log(USAGE);
    return 1;
  }

  const invocation: BuildInvocation = {
    siteDir: resolve(target ?? "."),
    overrides: {
      template: values.template,
      base_url: values["base-url"],
      theme_rtl: values.rtl,
      theme_inverted: values.inverted,
    },
    outputDir: values.output ? resolve(values.output) : undefined,
    clean: values.clean ?? false,
  };

  if (command === "build") {
    return runBuild(invocation);
  }
  if (command === "watch") {
    return runWatch({ ...invocation, clean: false });
  }

  console.error(`Unknown command: ${command}`);
  console.error(USAGE);
  return 1;
}
