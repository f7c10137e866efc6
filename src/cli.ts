// CHANGE: Expose plugin download and dry-run resolution through a commander program.
// WHY: Keeps wiring testable without executing process-wide side effects.

import path from "path";
import { pathToFileURL } from "url";
import { Command, CommanderError } from "commander";
import fs from "fs-extra";
import { Catalog } from "./catalog.js";
import { MIRRORS, OUTPUT } from "./config.js";
import { DownloadEngine } from "./downloader.js";
import { describeError } from "./errors.js";
import { error as logError, info, setLogLevel } from "./logger.js";
import { DownloadManifest } from "./manifest.js";
import { MirrorSelector } from "./mirrors.js";
import { PluginDownloader } from "./orchestrator.js";
import { DownloadReport } from "./types.js";

/**
 * Parsed command-line options.
 *
 * @property version - Pinned version for the requested plugin only.
 * @property mirror - Mirror bases overriding `HPI_MIRRORS`.
 */
export interface CliOptions {
  readonly version?: string;
  readonly outputDir: string;
  readonly mirror?: readonly string[];
  readonly dryRun?: boolean;
  readonly verbose?: boolean;
}

export interface Runtime {
  readonly catalog: Catalog;
  readonly downloader: Pick<PluginDownloader, "downloadWithDependencies" | "resolve">;
}

/**
 * Wire catalog, mirrors, engine and manifest for one run.
 */
export async function createRuntime(options: CliOptions): Promise<Runtime> {
  const catalog = new Catalog();
  const mirrors = new MirrorSelector(options.mirror && options.mirror.length > 0 ? options.mirror : MIRRORS.BASES);
  const engine = new DownloadEngine({ mirrors });
  let manifest: DownloadManifest | undefined;
  if (!options.dryRun) {
    manifest = DownloadManifest.inDirectory(options.outputDir);
    await manifest.load();
  }
  return {
    catalog,
    downloader: new PluginDownloader({ catalog, engine, outputDir: options.outputDir, manifest })
  };
}

/**
 * Print the resolved plan without downloading anything.
 */
export async function dryRunAction(pluginId: string, options: CliOptions, runtime: Runtime): Promise<void> {
  const plan = await runtime.downloader.resolve(pluginId, options.version);
  const rows = [
    ...plan.dependencies.map(id => ({ plugin: id, version: runtime.catalog.get(id)?.version ?? "(unknown)" })),
    { plugin: plan.root, version: plan.version }
  ].map((row, idx) => ({ order: idx + 1, ...row }));
  info(`Dry-run: ${plan.root}@${plan.version} requires ${plan.dependencies.length} plugins.`);
  console.table(rows);
}

/**
 * Download the requested plugin with its dependencies into the output directory.
 */
export async function downloadAction(pluginId: string, options: CliOptions, runtime: Runtime): Promise<DownloadReport> {
  const report = await runtime.downloader.downloadWithDependencies(pluginId, options.version);
  info(`Plugin download complete: ${pluginId} (${report.downloaded.length} downloaded, ${report.skipped.length} skipped)`);
  info(`Download location: ${path.resolve(options.outputDir)}`);
  return report;
}

/**
 * Construct commander program with configured arguments and options.
 *
 * @param makeRuntime - Runtime factory, replaced in tests.
 */
export function buildProgram(makeRuntime: (options: CliOptions) => Promise<Runtime> = createRuntime): Command {
  const program = new Command();
  program
    .name("hpi-downloader")
    .description("Download a plugin and its required dependencies from the update center")
    .argument("<plugin>", "plugin identifier")
    .option("-v, --version <version>", "plugin version (latest when omitted)")
    .option("-o, --output-dir <dir>", "download directory", OUTPUT.DEFAULT_DIR)
    .option("--mirror <url...>", "mirror base URLs, tried in order")
    .option("--dry-run", "print the download plan without downloading")
    .option("--verbose", "enable debug logging")
    .action(async (pluginId: string, options: CliOptions) => {
      if (options.verbose) {
        setLogLevel("debug");
      }
      const runtime = await makeRuntime(options);
      if (options.dryRun) {
        await dryRunAction(pluginId, options, runtime);
        return;
      }
      await downloadAction(pluginId, options, runtime);
    });
  return program;
}

/**
 * Execute CLI with provided argv array; failures set a non-zero exit code.
 *
 * @param argv - Process arguments.
 */
export async function runCli(
  argv: readonly string[],
  makeRuntime: (options: CliOptions) => Promise<Runtime> = createRuntime
): Promise<void> {
  const program = buildProgram(makeRuntime);
  try {
    await program
      .exitOverride()
      .configureOutput({
        outputError: (str: string) => logError(str.trimEnd())
      })
      .parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Usage errors and --help were already printed by commander.
      process.exitCode = error.exitCode;
      return;
    }
    logError(`Download failed: ${describeError(error)}`);
    process.exitCode = 1;
  }
}

/**
 * Whether `scriptPath` (usually `process.argv[1]`) is the module at `moduleUrl`.
 *
 * npm installs the binary as a symlink, so the path is resolved before comparing.
 */
export function isDirectExecution(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath || !fs.existsSync(scriptPath)) {
    return false;
  }
  return pathToFileURL(fs.realpathSync(scriptPath)).href === moduleUrl;
}
