/**
 * Document conversion collaborator.
 *
 * The upload tool needs two things from a word processor: the plain text
 * of an arbitrary document, and an RTF rendering of plain text in a given
 * paragraph style. `DocumentConverter` is that contract; the rest of the
 * code never assumes how it is fulfilled.
 *
 * `LibreOfficeConverter` fulfils it by running the `libreoffice` binary
 * headless. A running Writer instance can make these calls return empty
 * output, which callers report as an empty document.
 */

import { execFile } from "node:child_process";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { extname, join } from "node:path";
import { promisify } from "node:util";

import { replaceRtfStyle } from "./rtf.js";

const execFileAsync = promisify(execFile);

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

export interface RtfStyleSwap {
  /** Style the converter produces, e.g. "Preformatted Text". */
  sourceStyle: string;
  /** Style it should be replaced with, e.g. "Normal". */
  targetStyle: string;
}

export interface DocumentConverter {
  /** Plain text of the document at `filePath`. */
  extractText(filePath: string): Promise<string>;
  /** RTF document holding `text`, with `styles.sourceStyle` swapped out. */
  convertToRtf(text: string, styles: RtfStyleSwap): Promise<string>;
}

export class DocumentConversionError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(message);
    this.name = "DocumentConversionError";
  }
}

/** Default style swap for stories. */
export const STORY_RTF_STYLES: RtfStyleSwap = {
  sourceStyle: "Preformatted Text",
  targetStyle: "Normal",
};

// ---------------------------------------------------------------------------
// LibreOffice
// ---------------------------------------------------------------------------

interface ExecFailure {
  code?: number | string;
  stderr?: string | Buffer;
}

function isExecFailure(err: unknown): err is Error & ExecFailure {
  return err instanceof Error && ("code" in err || "stderr" in err);
}

export interface LibreOfficeConverterOptions {
  /** Binary to run. Default: "libreoffice". */
  binary?: string;
  /** Kill the process after this many milliseconds. Default: 120000. */
  timeoutMs?: number;
}

export class LibreOfficeConverter implements DocumentConverter {
  private readonly binary: string;
  private readonly timeoutMs: number;

  constructor(options: LibreOfficeConverterOptions = {}) {
    this.binary = options.binary ?? "libreoffice";
    this.timeoutMs = options.timeoutMs ?? 120_000;
  }

  private async run(args: string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync(this.binary, args, {
        encoding: "utf-8",
        maxBuffer: 64 * 1024 * 1024,
        timeout: this.timeoutMs,
      });
      return stdout;
    } catch (err) {
      if (isExecFailure(err)) {
        const exitCode = typeof err.code === "number" ? err.code : null;
        const stderr = err.stderr === undefined ? "" : err.stderr.toString();
        throw new DocumentConversionError(
          `${this.binary} ${args.join(" ")} failed: ${err.message}`,
          exitCode,
          stderr
        );
      }
      throw err;
    }
  }

  async extractText(filePath: string): Promise<string> {
    const stdout = await this.run(["--cat", filePath]);
    return stdout.replace(/^\uFEFF/, "");
  }

  async convertToRtf(text: string, styles: RtfStyleSwap): Promise<string> {
    const workDir = await mkdtemp(join(tmpdir(), "gallery-upload-rtf-"));
    try {
      const textPath = join(workDir, "story.txt");
      await writeFile(textPath, text, "utf-8");
      await this.run([
        "--convert-to",
        "rtf:Rich Text Format",
        "--outdir",
        workDir,
        textPath,
      ]);
      const rtf = await readFile(join(workDir, "story.rtf"), "utf-8");
      return replaceRtfStyle(rtf, styles.sourceStyle, styles.targetStyle);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}

// ---------------------------------------------------------------------------
// Reading sources
// ---------------------------------------------------------------------------

/** Extensions read straight from disk instead of through the converter. */
const PLAIN_TEXT_EXTENSIONS = new Set([".txt", ".md"]);

/**
 * Text of a source document: plain-text files are read directly, anything
 * else (.odt, .docx, .rtf …) goes through the converter.
 */
export async function readDocumentText(
  filePath: string,
  converter: DocumentConverter
): Promise<string> {
  if (PLAIN_TEXT_EXTENSIONS.has(extname(filePath).toLowerCase())) {
    const text = await readFile(filePath, "utf-8");
    return text.replace(/^\uFEFF/, "");
  }
  return converter.extractText(filePath);
}
