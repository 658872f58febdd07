#!/usr/bin/env node
/**
 * CLI tool to generate multi-gallery upload files.
 *
 * Takes a story document, a tagged description and any extra files, and
 * fills an output directory with everything needed to upload the piece to
 * each configured gallery:
 *
 *   desc_<site>.txt / desc_weasyl.md   one description per configured site
 *   <story>.txt / .md / .rtf           story in each format the sites take
 *   copies of every --file             thumbnails, images, …
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   npm run upload -- -d description.odt -s story.odt -f cover.png
 *   npm run upload -- -d description.txt -D nsfw -o out/
 *
 * Options:
 *   -o, --output-dir <dir>     Output directory (default: ./out)
 *   -c, --config <path>        Username configuration JSON (default: ./config.json)
 *   -D, --define-option <opt>  Flag for [if=define…] (repeatable)
 *   -s, --story <path>         Story document
 *   -d, --description <path>   Tagged description document
 *   -f, --file <path>          Extra file to copy to the output (repeatable)
 *   -k, --keep-out-dir         Keep existing output directory contents
 *   -I, --ignore-empty-files   Do not fail on empty story/description text
 *   -h, --help                 Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Invalid arguments, configuration, description or conversion failure
 */

import { existsSync, statSync } from "node:fs";
import { copyFile, mkdir, mkdtemp, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  ConfigError,
  UsernameConfigError,
  loadAppConfig,
  readUsernameConfigFile,
  type UsernameConfig,
} from "../config/index.js";
import { createLogger, initRunId, type Logger } from "../logging/index.js";
import { DEFAULT_SITE_REGISTRY, type SiteRegistry } from "../sites/index.js";
import {
  DefineOptionError,
  DescriptionParseError,
  generateDescriptions,
  parseDefineOptions,
  type SiteDescription,
} from "../description/index.js";
import {
  DocumentConversionError,
  LibreOfficeConverter,
  RtfStyleError,
  StoryProcessingError,
  processStory,
  readDocumentText,
  type DocumentConverter,
} from "../story/index.js";

// ============================================================
// Types
// ============================================================

export interface UploadArgs {
  outputDir: string;
  config: string;
  defineOptions: string[];
  story?: string;
  description?: string;
  files: string[];
  keepOutDir: boolean;
  ignoreEmptyFiles: boolean;
  help: boolean;
}

export interface UploadDependencies {
  converter: DocumentConverter;
  logger: Logger;
  registry?: SiteRegistry;
}

export interface UploadSummary {
  /** Every file written to the output directory. */
  files: string[];
  descriptions: SiteDescription[];
}

export class UploadArgumentError extends Error {
  constructor(public readonly problems: string[]) {
    super(problems.join("\n"));
    this.name = "UploadArgumentError";
  }
}

export class EmptySourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmptySourceError";
  }
}

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: gallery-upload [options]

Generate upload-ready descriptions and story files for each configured gallery.
At least one of --story, --description or --file is required.

Options:
  -o, --output-dir <dir>     Output directory (default: ./out)
  -c, --config <path>        Username configuration JSON (default: ./config.json)
  -D, --define-option <opt>  Flag for [if=define==…] conditions (repeatable)
  -s, --story <path>         Story document (any format LibreOffice reads)
  -d, --description <path>   Tagged description (.txt/.md, or any LibreOffice format)
  -f, --file <path>          Extra file to copy to the output (repeatable)
  -k, --keep-out-dir         Keep existing output directory contents
                             (a failure may then leave partial files behind)
  -I, --ignore-empty-files   Do not fail if the story or description is empty
  -h, --help                 Show this help message
`;

/**
 * Parse command-line arguments.
 *
 * @throws UploadArgumentError on unknown options or missing option values
 */
export function parseUploadArgs(argv: string[]): UploadArgs {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        "output-dir": { type: "string", short: "o", default: "./out" },
        config: { type: "string", short: "c", default: "./config.json" },
        "define-option": { type: "string", short: "D", multiple: true },
        story: { type: "string", short: "s" },
        description: { type: "string", short: "d" },
        file: { type: "string", short: "f", multiple: true },
        "keep-out-dir": { type: "boolean", short: "k", default: false },
        "ignore-empty-files": { type: "boolean", short: "I", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });

    return {
      outputDir: values["output-dir"] ?? "./out",
      config: values.config ?? "./config.json",
      defineOptions: values["define-option"] ?? [],
      story: values.story,
      description: values.description,
      files: values.file ?? [],
      keepOutDir: values["keep-out-dir"] ?? false,
      ignoreEmptyFiles: values["ignore-empty-files"] ?? false,
      help: values.help ?? false,
    };
  } catch (err) {
    // parseArgs reports unknown options and missing values as TypeError
    if (err instanceof TypeError) {
      throw new UploadArgumentError([err.message]);
    }
    throw err;
  }
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/**
 * Check that the arguments make sense against the file system.
 *
 * @throws UploadArgumentError listing every problem found
 */
export function validateUploadArgs(args: UploadArgs): void {
  const problems: string[] = [];

  if (!args.story && !args.description && args.files.length === 0) {
    problems.push("at least one of ( --story | --description | --file ) must be set");
  }
  if (existsSync(args.outputDir) && !statSync(args.outputDir).isDirectory()) {
    problems.push(
      `--output-dir ${args.outputDir} must be an existing directory or inexistent; found a file instead`
    );
  }
  if (args.story && !isFile(args.story)) {
    problems.push(`--story ${args.story} is not a valid file`);
  }
  if (args.description && !isFile(args.description)) {
    problems.push(`--description ${args.description} is not a valid file`);
  }
  for (const file of args.files) {
    if (!isFile(file)) {
      problems.push(`--file ${file} is not a valid file`);
    }
  }
  if ((args.story || args.description) && !isFile(args.config)) {
    problems.push(`--config ${args.config} must be a valid file`);
  }

  if (problems.length > 0) {
    throw new UploadArgumentError(problems);
  }
}

// ============================================================
// Upload
// ============================================================

/**
 * Produce every upload file in `args.outputDir`.
 *
 * Unless `keepOutDir` is set, an existing output directory is moved aside
 * first and put back if anything fails, so a failed run never leaves a mix
 * of old and new files.
 */
export async function runUpload(
  args: UploadArgs,
  deps: UploadDependencies
): Promise<UploadSummary> {
  const { converter, logger, registry = DEFAULT_SITE_REGISTRY } = deps;

  let usernames: UsernameConfig = {};
  if (args.story || args.description) {
    const loaded = readUsernameConfigFile(args.config, registry);
    for (const key of loaded.ignoredKeys) {
      logger.warn(`Ignoring unknown configuration key "${key}"`);
    }
    usernames = loaded.usernames;
  }

  const { flags, duplicates } = parseDefineOptions(args.defineOptions);
  if (duplicates.length > 0) {
    logger.warn("Duplicated entries defined with -D / --define-option", { duplicates });
  }

  const outDir = resolve(args.outputDir);
  const moveAside = !args.keepOutDir && existsSync(outDir);
  let backupRoot: string | null = null;

  if (moveAside) {
    backupRoot = await mkdtemp(join(dirname(outDir), ".gallery-upload-"));
    await rename(outDir, join(backupRoot, "old_out"));
  }
  await mkdir(outDir, { recursive: true });

  const files: string[] = [];
  let descriptions: SiteDescription[] = [];

  try {
    if (args.story) {
      files.push(
        ...(await processStory(args.story, {
          usernames,
          outDir,
          converter,
          ignoreEmptyFiles: args.ignoreEmptyFiles,
          logger,
        }))
      );
    }

    if (args.description) {
      const source = await readDocumentText(args.description, converter);
      if (source.trim() === "") {
        const message = `Description processing returned empty file: ${args.description}`;
        if (!args.ignoreEmptyFiles) {
          throw new EmptySourceError(message);
        }
        logger.warn(`Ignoring error (${message})`);
      }

      // Every site is rendered before any description file is written
      descriptions = generateDescriptions(source, {
        usernames,
        definedFlags: flags,
        registry,
        logger,
      });
      for (const description of descriptions) {
        const outPath = join(outDir, description.fileName);
        await writeFile(outPath, description.text, "utf-8");
        files.push(outPath);
      }
      logger.info("Descriptions written", { sites: descriptions.map((d) => d.site) });
    }

    for (const file of args.files) {
      const outPath = join(outDir, basename(file));
      await copyFile(file, outPath);
      files.push(outPath);
    }
  } catch (err) {
    if (backupRoot !== null) {
      await rm(outDir, { recursive: true, force: true });
      await rename(join(backupRoot, "old_out"), outDir);
    }
    throw err;
  } finally {
    if (backupRoot !== null) {
      await rm(backupRoot, { recursive: true, force: true });
    }
  }

  return { files, descriptions };
}

// ============================================================
// Error reporting
// ============================================================

/**
 * Human-readable message for errors the tool expects, or null for anything
 * else (which is re-thrown with its stack).
 */
export function describeKnownError(err: unknown): string | null {
  if (err instanceof UsernameConfigError) {
    return err.format();
  }
  if (err instanceof DocumentConversionError) {
    return err.stderr.trim() === "" ? err.message : `${err.message}\n${err.stderr.trim()}`;
  }
  if (
    err instanceof UploadArgumentError ||
    err instanceof DescriptionParseError ||
    err instanceof DefineOptionError ||
    err instanceof StoryProcessingError ||
    err instanceof RtfStyleError ||
    err instanceof EmptySourceError ||
    err instanceof ConfigError
  ) {
    return err.message;
  }
  return null;
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseUploadArgs(process.argv.slice(2));
  if (args.help) {
    console.log(HELP);
    return;
  }
  validateUploadArgs(args);

  const appConfig = loadAppConfig();
  const runId = initRunId();
  const logger = createLogger({
    level: appConfig.logLevel,
    logDir: appConfig.logDir,
    logFile: `${appConfig.appName}.log`,
    file: appConfig.logToFile,
  });

  logger.info("Upload run starting", { runId, env: appConfig.env });
  const summary = await runUpload(args, { converter: new LibreOfficeConverter(), logger });

  for (const file of summary.files) {
    console.log(file);
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("upload.ts") ||
   process.argv[1].endsWith("upload.js") ||
   process.argv[1].endsWith("gallery-upload"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    const message = describeKnownError(err);
    if (message === null) {
      throw err;
    }
    console.error(`Error: ${message}`);
    process.exit(1);
  });
}
