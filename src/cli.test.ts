import { afterAll, afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { existsSync } from "fs";
import { mkdir, readFile, rm, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { resolveSiteConfig } from "./config";
import { USAGE, runCli, watchedPaths } from "./cli";

const repoRoot = fileURLToPath(new URL("..", import.meta.url));
const fixtureRoot = resolve(repoRoot, ".folio-test", `cli-${Date.now()}`);
let siteCount = 0;

const HELLO = "---\ntitle: Hello\ndate: 2024-01-01\n---\nHello there.\n";

async function createSite(files: Record<string, string>): Promise<string> {
  siteCount += 1;
  const rootDir = resolve(fixtureRoot, `site-${siteCount}`);
  for (const [path, contents] of Object.entries(files)) {
    const target = resolve(rootDir, path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, contents);
  }
  return rootDir;
}

function errorOutput(): string {
  return vi
    .mocked(console.error)
    .mock.calls.map((args) => args.map(String).join(" "))
    .join("\n");
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

afterAll(async () => {
  await rm(fixtureRoot, { recursive: true, force: true });
});

describe("runCli", () => {
  test("prints usage without a command", async () => {
    expect(await runCli([])).toBe(1);
    expect(console.log).toHaveBeenCalledWith(USAGE);
  });

  test("rejects unknown commands", async () => {
    expect(await runCli(["publish"])).toBe(1);
    expect(errorOutput()).toContain("Unknown command: publish");
  });

  test("rejects unknown flags", async () => {
    expect(await runCli(["build", "--nope"])).toBe(1);
    expect(errorOutput()).toContain(USAGE);
  });

  test("builds a site and exits 0", async () => {
    const rootDir = await createSite({
      "folio.config.ts": 'export default { title: "CLI Site", feed: false };\n',
      "content/hello.md": HELLO,
    });

    expect(await runCli(["build", rootDir])).toBe(0);

    const html = await readFile(resolve(rootDir, "public/hello/index.html"), "utf8");
    expect(html).toContain('<a class="site-title" href="/">CLI Site</a>');
    expect(existsSync(resolve(rootDir, "public/index.xml"))).toBe(false);
  });

  test("command line flags override the config file", async () => {
    const rootDir = await createSite({ "content/hello.md": HELLO });
    const outputDir = resolve(rootDir, "out");

    expect(await runCli(["build", rootDir, "--rtl", "--output", outputDir, "--base-url", "/site"])).toBe(0);

    const html = await readFile(resolve(outputDir, "hello/index.html"), "utf8");
    expect(html).toContain('<link rel="stylesheet" href="/site/css/rtl.css">');
    expect(existsSync(resolve(rootDir, "public"))).toBe(false);
  });

  test("exits 1 when a document fails, still writing the others", async () => {
    const rootDir = await createSite({
      "content/bad.md": "---\ndate: 2024-01-01\n---\nNo title.\n",
      "content/hello.md": HELLO,
    });

    expect(await runCli(["build", rootDir])).toBe(1);
    expect(errorOutput()).toContain('bad.md: missing required key "title"');
    expect(existsSync(resolve(rootDir, "public/hello/index.html"))).toBe(true);
  });

  test("exits 1 on a slug collision", async () => {
    const rootDir = await createSite({
      "content/a.md": "---\ntitle: A\ndate: 2024-01-01\nslug: same\n---\n",
      "content/b.md": "---\ntitle: B\ndate: 2024-01-01\nslug: same\n---\n",
    });

    expect(await runCli(["build", rootDir])).toBe(1);
    expect(errorOutput()).toContain('Multiple source files resolve to the same output "same/index.html": a.md, b.md');
    expect(existsSync(resolve(rootDir, "public"))).toBe(false);
  });

  test("exits 1 on an invalid config file", async () => {
    const rootDir = await createSite({
      "folio.config.ts": 'export default { theme_rtl: "yes" };\n',
      "content/hello.md": HELLO,
    });

    expect(await runCli(["build", rootDir])).toBe(1);
    expect(errorOutput()).toContain("theme_rtl: Expected boolean, received string");
  });
});

describe("runCli configuration errors", () => {
  test("exits 1 on a title format that does not compile", async () => {
    const rootDir = await createSite({
      "folio.config.ts": 'export default { title_format: "{% if %}" };\n',
      "content/hello.md": HELLO,
    });

    expect(await runCli(["build", rootDir])).toBe(1);
    expect(errorOutput()).toContain("title_format: invalid template:");
    expect(existsSync(resolve(rootDir, "public"))).toBe(false);
  });

  test("exits 1 on a permalink that does not compile", async () => {
    const rootDir = await createSite({
      "folio.config.ts": 'export default { permalink: "{{ slug" };\n',
      "content/hello.md": HELLO,
    });

    expect(await runCli(["build", rootDir])).toBe(1);
    expect(errorOutput()).toContain("permalink: invalid template:");
  });

  test("refuses to clean an output directory holding the content", async () => {
    const rootDir = await createSite({ "content/hello.md": HELLO });

    expect(await runCli(["build", rootDir, "--output", resolve(rootDir, "content"), "--clean"])).toBe(1);
    expect(errorOutput()).toContain("overlaps the content directory");
    expect(existsSync(resolve(rootDir, "content/hello.md"))).toBe(true);
  });
});

describe("watchedPaths", () => {
  test("covers config, content, static files, the template and custom stylesheets", () => {
    const siteDir = resolve(fixtureRoot, "watched");
    const config = resolveSiteConfig({ custom_stylesheets: ["assets/site.css"] });

    expect(watchedPaths(siteDir, config)).toEqual([
      resolve(siteDir, "folio.config.ts"),
      resolve(siteDir, "content"),
      resolve(siteDir, "static"),
      fileURLToPath(new URL("../templates/default", import.meta.url)),
      resolve(siteDir, "assets/site.css"),
    ]);
  });
});
