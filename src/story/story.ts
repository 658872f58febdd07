/**
 * Story file generation.
 *
 * One source document becomes up to three upload files, depending on which
 * sites are configured:
 *
 *   .txt : Fur Affinity, Inkbunny, SoFurry (CRLF, one blank line between
 *           paragraphs)
 *   .md  : Weasyl (as .txt, with Markdown-significant characters escaped)
 *   .rtf : Eka's Portal (converted by the document converter, serif style)
 */

import { basename, join } from "node:path";
import { writeFile } from "node:fs/promises";

import type { SiteId } from "../sites/index.js";
import type { UsernameConfig } from "../config/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import {
  STORY_RTF_STYLES,
  readDocumentText,
  type DocumentConverter,
} from "./converter.js";

export type StoryFormat = "txt" | "md" | "rtf";

export class StoryProcessingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StoryProcessingError";
  }
}

const STORY_FORMATS: readonly StoryFormat[] = ["txt", "md", "rtf"];

/** Sites that take each story format. */
const STORY_FORMAT_SITES: Readonly<Record<StoryFormat, readonly SiteId[]>> = {
  txt: ["furaffinity", "inkbunny", "sofurry"],
  md: ["weasyl"],
  rtf: ["aryion"],
};

// ---------------------------------------------------------------------------
// Text shaping
// ---------------------------------------------------------------------------

/**
 * Trim lines, drop leading and trailing blank lines, and collapse every
 * run of blank lines into a single "" entry.
 */
export function normalizeStoryLines(text: string): string[] {
  const lines: string[] = [];
  let pendingBlank = false;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line === "") {
      pendingBlank = lines.length > 0;
      continue;
    }
    if (pendingBlank) {
      lines.push("");
      pendingBlank = false;
    }
    lines.push(line);
  }

  return lines;
}

/**
 * Escape characters Weasyl's Markdown would otherwise interpret:
 * `*` becomes `\*` and runs of `=` are split (`==` → `= =`).
 */
export function escapeStoryMarkdown(line: string): string {
  return line.replace(/\*/g, "\\*").replace(/=(?==)/g, "= ");
}

export function formatStoryText(lines: readonly string[]): string {
  return lines.join("\r\n") + "\r\n";
}

export function formatStoryMarkdown(lines: readonly string[]): string {
  return lines.map(escapeStoryMarkdown).join("\r\n") + "\r\n";
}

/**
 * Converter input for RTF: paragraphs only, one per LF-terminated line.
 */
export function formatStoryRtfSource(lines: readonly string[]): string {
  return lines.filter((line) => line !== "").join("\n");
}

/**
 * Formats to produce for the configured sites, in txt, md, rtf order.
 */
export function planStoryFormats(usernames: UsernameConfig): StoryFormat[] {
  return STORY_FORMATS.filter((format) =>
    STORY_FORMAT_SITES[format].some((site) => usernames[site] !== undefined)
  );
}

async function renderStoryFormat(
  format: StoryFormat,
  lines: readonly string[],
  converter: DocumentConverter
): Promise<string> {
  if (lines.length === 0) {
    return "";
  }
  switch (format) {
    case "txt":
      return formatStoryText(lines);
    case "md":
      return formatStoryMarkdown(lines);
    case "rtf":
      return converter.convertToRtf(formatStoryRtfSource(lines), STORY_RTF_STYLES);
  }
}

// ---------------------------------------------------------------------------
// Processing
// ---------------------------------------------------------------------------

export interface ProcessStoryOptions {
  usernames: UsernameConfig;
  outDir: string;
  converter: DocumentConverter;
  /** Write empty files instead of failing when the story has no text. */
  ignoreEmptyFiles?: boolean;
  logger?: Logger;
}

/**
 * Generate the story files for the configured sites.
 *
 * @returns Paths of the files written
 * @throws StoryProcessingError if no configured site takes stories, or the
 *         story is empty and `ignoreEmptyFiles` is not set
 */
export async function processStory(
  storyPath: string,
  options: ProcessStoryOptions
): Promise<string[]> {
  const { usernames, outDir, converter, ignoreEmptyFiles = false, logger = silentLogger } = options;

  const formats = planStoryFormats(usernames);
  if (formats.length === 0) {
    throw new StoryProcessingError(
      "Invalid configuration for story parsing: no configured website accepts stories"
    );
  }

  const lines = normalizeStoryLines(await readDocumentText(storyPath, converter));
  if (lines.length === 0) {
    const message = `Story processing returned empty file: ${storyPath}`;
    if (!ignoreEmptyFiles) {
      throw new StoryProcessingError(message);
    }
    logger.warn(`Ignoring error (${message})`);
  }

  const storyName = basename(storyPath).split(".")[0];
  const written: string[] = [];

  for (const format of formats) {
    const outPath = join(outDir, `${storyName}.${format}`);

    if (format === "rtf" && lines.length === 0) {
      logger.warn("Skipping RTF conversion of empty story", { path: outPath });
      continue;
    }

    await writeFile(outPath, await renderStoryFormat(format, lines, converter), "utf-8");
    logger.info("Story file written", { format, path: outPath });
    written.push(outPath);
  }

  return written;
}
