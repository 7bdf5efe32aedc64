import { existsSync } from "fs";
import { copyFile, mkdir, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import type { SiteConfig } from "../config";
import { listFiles } from "../content/load";
import { ConfigError, IOError } from "../errors";
import { loadTemplateCss } from "../presentation/template";

export type Asset =
  | { outputPath: string; source: string; contents: string }
  | { outputPath: string; source: string; sourcePath: string };

/**
 * Stylesheets and static files for one build: the template's compiled
 * stylesheets, the rtl/inverted variants when enabled, custom stylesheets in
 * config order, then everything under the static directory.
 */
export async function collectAssets(opts: {
  rootDir: string;
  config: SiteConfig;
  templateDir: string;
}): Promise<Asset[]> {
  const { rootDir, config, templateDir } = opts;
  const assets: Asset[] = [
    {
      outputPath: "css/style.css",
      source: `${config.template}/style.css`,
      contents: await loadTemplateCss(templateDir, config.template),
    },
  ];

  if (config.theme_rtl) {
    assets.push({
      outputPath: "css/rtl.css",
      source: `${config.template}/rtl.css`,
      contents: await loadTemplateCss(templateDir, config.template, "rtl.css"),
    });
  }

  if (config.theme_inverted) {
    assets.push({
      outputPath: "css/inverted.css",
      source: `${config.template}/inverted.css`,
      contents: await loadTemplateCss(templateDir, config.template, "inverted.css"),
    });
  }

  for (const stylesheet of config.custom_stylesheets) {
    const sourcePath = resolve(rootDir, stylesheet);
    if (!existsSync(sourcePath)) {
      throw new ConfigError(`Custom stylesheet "${stylesheet}" not found at ${sourcePath}`);
    }
    assets.push({ outputPath: stylesheet, source: stylesheet, sourcePath });
  }

  const staticDir = resolve(rootDir, config.static_dir);
  for (const file of await listFiles(staticDir)) {
    assets.push({
      outputPath: file,
      source: `${config.static_dir}/${file}`,
      sourcePath: resolve(staticDir, file),
    });
  }

  return assets;
}

export async function writeAsset(asset: Asset, outputDir: string): Promise<void> {
  const target = resolve(outputDir, asset.outputPath);
  try {
    await mkdir(dirname(target), { recursive: true });
    if ("contents" in asset) {
      await writeFile(target, asset.contents);
    } else {
      await copyFile(asset.sourcePath, target);
    }
  } catch (err) {
    throw new IOError(target, err, "write");
  }
}
