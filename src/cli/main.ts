#!/usr/bin/env node

import path from "path";
import { Command, InvalidArgumentError } from "commander";
import pluralize from "pluralize";

import { SymlinkPolicySchema, type SymlinkPolicy, type Template } from "../schema";
import { loadDirplateConfig, resolveRootDir } from "../core/config-loader";
import { formatCopyStats, type CopyEntryEvent } from "../core/copy-tree";
import { initConfig } from "../core/init-config";
import { TemplateRegistry } from "../core/registry";
import {
  captureTemplate,
  findTemplate,
  instantiateTemplate,
  listTemplates,
  pruneTemplates,
  removeTemplate,
  showTemplate,
  type ActionContext,
} from "../core/template-actions";
import { defaultLogger, type Logger } from "../util/logger";
import { runMenu } from "./menu";
import { askYesNo, Prompter } from "./prompt";

export const VERSION = "0.1.0";

type BaseCliOptions = {
  root?: string;
  quiet?: boolean;
  debug?: boolean;
};

interface CaptureCliOptions {
  ignore?: string[];
  description?: string;
  defaults: boolean;
  force?: boolean;
  dryRun?: boolean;
  symlinks?: SymlinkPolicy;
  pruneEmpty?: boolean;
}

interface NewCliOptions {
  name?: string;
  force?: boolean;
  dryRun?: boolean;
  symlinks?: SymlinkPolicy;
}

interface RmCliOptions {
  yes?: boolean;
}

interface TreeCliOptions {
  depth?: number;
}

interface InitCliOptions {
  force?: boolean;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger.child("[cli]");
}

function parseSymlinkPolicy(value: string): SymlinkPolicy {
  const parsed = SymlinkPolicySchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError("Expected one of: copy, follow, skip.");
  }
  return parsed.data;
}

function parseDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return depth;
}

async function createContext(baseOpts: BaseCliOptions): Promise<ActionContext> {
  const { config, rootDir } = await loadDirplateConfig({ rootDir: baseOpts.root });
  const registry = new TemplateRegistry({
    rootDir,
    lockTimeoutMs: config.lockTimeoutMs,
  });
  return { registry, config };
}

/**
 * Abort the running copy on Ctrl+C; it stops before the next entry.
 */
function cancelOnInterrupt(logger: Logger): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn("Interrupted; stopping after the current entry...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onInterrupt);
    },
  };
}

function fail(logger: Logger, message: string): void {
  logger.error(message);
  process.exitCode = 1;
}

function formatPlanLine(event: CopyEntryEvent): string {
  if (event.action === "copy") {
    return `+ ${event.path}${event.type === "directory" ? "/" : ""}`;
  }
  const why = event.pattern ? `matches "${event.pattern}"` : event.reason;
  return `- ${event.path} (${why})`;
}

function formatTemplateListing(template: Template): string {
  const description = template.description ?? "No description.";
  return [
    template.name,
    `  ${description}`,
    `  from ${template.sourcePath}, captured ${template.createdAt}`,
  ].join("\n");
}

async function handleListCommand(baseOpts: BaseCliOptions) {
  const logger = createCliLogger(baseOpts);
  const ctx = await createContext(baseOpts);

  const result = await listTemplates(ctx);
  if (!result.ok) return fail(logger, result.message);

  if (result.value.length === 0) {
    logger.info('No templates yet. Capture one with "dirplate capture [name] [folder]".');
    return;
  }
  process.stdout.write(result.value.map(formatTemplateListing).join("\n") + "\n");
}

async function handleCaptureCommand(
  cwd: string,
  name: string | undefined,
  source: string | undefined,
  captureOpts: CaptureCliOptions,
  baseOpts: BaseCliOptions,
) {
  const logger = createCliLogger(baseOpts);
  const ctx = await createContext(baseOpts);
  const sourcePath = path.resolve(cwd, source ?? ".");
  const interrupt = cancelOnInterrupt(logger);

  logger.debug(`Capturing ${sourcePath} as "${name ?? path.basename(sourcePath)}"`);

  try {
    const result = await captureTemplate(ctx, {
      name,
      sourcePath,
      ignore: captureOpts.ignore,
      useDefaults: captureOpts.defaults,
      description: captureOpts.description,
      overwrite: captureOpts.force,
      dryRun: captureOpts.dryRun,
      symlinks: captureOpts.symlinks,
      emptyDirs: captureOpts.pruneEmpty ? "prune" : undefined,
      signal: interrupt.signal,
      onEntry: captureOpts.dryRun
        ? (event) => process.stdout.write(formatPlanLine(event) + "\n")
        : undefined,
    });
    if (!result.ok) return fail(logger, result.message);

    const { template, stats } = result.value;
    if (captureOpts.dryRun) {
      logger.info(`Dry run: would capture ${formatCopyStats(stats)}.`);
      return;
    }
    logger.info(`New template ${template.name} was created (${formatCopyStats(stats)}).`);
    logger.info(`Run "dirplate new ${template.name}" to create a copy of it.`);
  } finally {
    interrupt.dispose();
  }
}

async function handleNewCommand(
  cwd: string,
  templateName: string,
  location: string | undefined,
  newOpts: NewCliOptions,
  baseOpts: BaseCliOptions,
) {
  const logger = createCliLogger(baseOpts);
  const ctx = await createContext(baseOpts);
  const interrupt = cancelOnInterrupt(logger);

  try {
    const result = await instantiateTemplate(ctx, {
      template: templateName,
      location: path.resolve(cwd, location ?? "."),
      dirName: newOpts.name,
      overwrite: newOpts.force,
      dryRun: newOpts.dryRun,
      symlinks: newOpts.symlinks,
      signal: interrupt.signal,
      onEntry: newOpts.dryRun
        ? (event) => process.stdout.write(formatPlanLine(event) + "\n")
        : undefined,
    });
    if (!result.ok) return fail(logger, result.message);

    const { destPath, stats } = result.value;
    if (newOpts.dryRun) {
      logger.info(`Dry run: would create ${destPath} (${formatCopyStats(stats)}).`);
      return;
    }
    logger.info(`Created ${destPath} from ${templateName} (${formatCopyStats(stats)}).`);
  } finally {
    interrupt.dispose();
  }
}

async function handleRmCommand(name: string, rmOpts: RmCliOptions, baseOpts: BaseCliOptions) {
  const logger = createCliLogger(baseOpts);
  const ctx = await createContext(baseOpts);

  const found = await findTemplate(ctx, name);
  if (!found.ok) return fail(logger, found.message);
  if (found.value && !rmOpts.yes) {
    const confirmed = await askYesNo(`Are you sure you want to delete "${name}"?`);
    if (!confirmed) {
      logger.info("Aborted.");
      return;
    }
  }

  const result = await removeTemplate(ctx, name);
  if (!result.ok) return fail(logger, result.message);
  logger.info(`Template ${name} deleted.`);
}

async function handleTreeCommand(name: string, treeOpts: TreeCliOptions, baseOpts: BaseCliOptions) {
  const logger = createCliLogger(baseOpts);
  const ctx = await createContext(baseOpts);

  const result = await showTemplate(ctx, name, { maxDepth: treeOpts.depth });
  if (!result.ok) return fail(logger, result.message);

  const { template, tree } = result.value;
  process.stdout.write(`${template.name}/\n${tree ? tree + "\n" : ""}`);
}

async function handlePruneCommand(baseOpts: BaseCliOptions) {
  const logger = createCliLogger(baseOpts);
  const ctx = await createContext(baseOpts);

  const result = await pruneTemplates(ctx);
  if (!result.ok) return fail(logger, result.message);

  const { removedPaths, droppedTemplates } = result.value;
  removedPaths.forEach((p) => logger.info(`Removed unreferenced storage ${p}`));
  droppedTemplates.forEach((n) => logger.warn(`Dropped template ${n}: its storage was missing`));
  if (removedPaths.length === 0 && droppedTemplates.length === 0) {
    logger.info("Registry and storage are consistent. Nothing to do.");
  } else {
    logger.info(
      `Pruned ${pluralize("directory", removedPaths.length, true)} and ${pluralize("entry", droppedTemplates.length, true)}.`,
    );
  }
}

function handleInitCommand(initOpts: InitCliOptions, baseOpts: BaseCliOptions) {
  createCliLogger(baseOpts);
  const rootDir = resolveRootDir({ rootDir: baseOpts.root });
  initConfig(rootDir, { force: initOpts.force });
}

async function handleMenu(cwd: string, baseOpts: BaseCliOptions) {
  createCliLogger(baseOpts);
  const ctx = await createContext(baseOpts);
  const prompter = new Prompter();
  try {
    await runMenu(ctx, {
      prompter,
      cwd,
      write: (text) => process.stdout.write(text),
    });
  } finally {
    prompter.close();
  }
}

export function createProgram(cwd: string = process.cwd()): Command {
  const program = new Command();

  const baseOptsOf = (cmd: Command): BaseCliOptions => cmd.parent?.opts<BaseCliOptions>() ?? {};

  program
    .name("dirplate")
    .description("Capture folders as templates and stamp out new copies of them")
    .version(VERSION)
    .option("-r, --root <path>", "Directory holding the registry and templates (default: $DIRPLATE_HOME or the platform config dir)")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  program
    .command("list")
    .alias("ls")
    .description("List the available templates")
    .action(async (_opts: object, cmd: Command) => {
      await handleListCommand(baseOptsOf(cmd));
    });

  program
    .command("capture")
    .alias("make")
    .description("Capture a folder as a new template")
    .argument("[name]", "Name of the new template (default: the source folder's name)")
    .argument("[source]", "Folder to capture (default: current directory)")
    .option("--ignore <patterns...>", "Glob patterns to leave out (relative to the source)")
    .option("-d, --description <text>", "Description of the template")
    .option("--no-defaults", "Skip the config's ignore patterns and the source's ignore file")
    .option("--force", "Replace an existing template of the same name")
    .option("--dry-run", "Show what would be captured without copying")
    .option("--symlinks <policy>", "Symbolic links: copy, follow or skip", parseSymlinkPolicy)
    .option("--prune-empty", "Do not create folders left empty after filtering")
    .action(
      async (
        name: string | undefined,
        source: string | undefined,
        captureOpts: CaptureCliOptions,
        cmd: Command,
      ) => {
        await handleCaptureCommand(cwd, name, source, captureOpts, baseOptsOf(cmd));
      },
    );

  program
    .command("new")
    .description("Create a new folder from a template")
    .argument("<template>", "Template to copy")
    .argument("[location]", "Where to create the folder (default: current directory)")
    .option("-n, --name <dir>", "Name of the new folder (default: the template name)")
    .option("--force", "Copy into the folder even if it is not empty")
    .option("--dry-run", "Show what would be created without copying")
    .option("--symlinks <policy>", "Symbolic links: copy, follow or skip", parseSymlinkPolicy)
    .action(
      async (
        templateName: string,
        location: string | undefined,
        newOpts: NewCliOptions,
        cmd: Command,
      ) => {
        await handleNewCommand(cwd, templateName, location, newOpts, baseOptsOf(cmd));
      },
    );

  program
    .command("rm")
    .alias("delete")
    .description("Delete a template and its stored files")
    .argument("<name>", "Template to delete")
    .option("-y, --yes", "Do not ask for confirmation")
    .action(async (name: string, rmOpts: RmCliOptions, cmd: Command) => {
      await handleRmCommand(name, rmOpts, baseOptsOf(cmd));
    });

  program
    .command("tree")
    .description("Show the files stored in a template")
    .argument("<name>", "Template to show")
    .option("--depth <number>", "Max directory depth (0 = top level only)", parseDepth)
    .action(async (name: string, treeOpts: TreeCliOptions, cmd: Command) => {
      await handleTreeCommand(name, treeOpts, baseOptsOf(cmd));
    });

  program
    .command("prune")
    .description("Remove storage no template refers to and entries whose storage is gone")
    .action(async (_opts: object, cmd: Command) => {
      await handlePruneCommand(baseOptsOf(cmd));
    });

  program
    .command("init")
    .description("Write a commented config.ts into the root directory")
    .option("--force", "Overwrite an existing config file")
    .action((initOpts: InitCliOptions, cmd: Command) => {
      handleInitCommand(initOpts, baseOptsOf(cmd));
    });

  // Base command: interactive menu
  program.action(async (opts: BaseCliOptions) => {
    await handleMenu(cwd, opts);
  });

  return program;
}

async function main() {
  await createProgram().parseAsync(process.argv);
}

// Run and handle errors
main().catch((err: unknown) => {
  defaultLogger.error(err);
  process.exit(1);
});
