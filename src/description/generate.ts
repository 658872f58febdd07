/**
 * Per-site description generation.
 *
 * Parses a description source once and renders it for every site that has
 * a username configured. Sites without a username are skipped; the output
 * for one site never depends on another's.
 */

import {
  DEFAULT_SITE_REGISTRY,
  type SiteId,
  type SiteRegistry,
} from "../sites/index.js";
import type { UsernameConfig } from "../config/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { parseDescription } from "./parser.js";
import { renderDescription, type ResolutionGap } from "./renderer.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GenerateOptions {
  usernames: UsernameConfig;
  /** Flags for `[if=define…]`. */
  definedFlags?: ReadonlySet<string>;
  registry?: SiteRegistry;
  logger?: Logger;
}

export interface SiteDescription {
  site: SiteId;
  /** File name the description should be written to. */
  fileName: string;
  text: string;
  gaps: readonly ResolutionGap[];
}

export class DefineOptionError extends Error {
  constructor(public readonly invalid: string[]) {
    super(
      `Invalid define option(s): ${invalid.join(", ")}. ` +
        "Options may only contain letters, digits, dashes and underscores."
    );
    this.name = "DefineOptionError";
  }
}

// ---------------------------------------------------------------------------
// Text normalisation
// ---------------------------------------------------------------------------

const DEFINE_OPTION_RE = /^[a-zA-Z0-9_-]+$/;
const MULTIPLE_EMPTY_LINES_RE = /\n\n+/g;

/**
 * Trim every line. Text extracted from word-processor documents carries
 * indentation and trailing spaces that are not part of the description.
 */
export function normalizeSourceText(raw: string): string {
  return raw
    .replace(/^\uFEFF/, "")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .join("\n");
}

/**
 * Collapse blank-line runs to a single blank line, trim, and end with a
 * newline. Blank output stays empty.
 */
export function finalizeDescription(text: string): string {
  const collapsed = text.replace(MULTIPLE_EMPTY_LINES_RE, "\n\n").trim();
  return collapsed === "" ? "" : collapsed + "\n";
}

/**
 * Validate `-D` options and de-duplicate them.
 *
 * @returns The flag set, and the names that were given more than once
 * @throws DefineOptionError if any option has characters outside [a-zA-Z0-9_-]
 */
export function parseDefineOptions(options: readonly string[]): {
  flags: ReadonlySet<string>;
  duplicates: string[];
} {
  const invalid = options.filter((option) => !DEFINE_OPTION_RE.test(option));
  if (invalid.length > 0) {
    throw new DefineOptionError(invalid);
  }

  const flags = new Set<string>();
  const duplicates = new Set<string>();
  for (const option of options) {
    if (flags.has(option)) {
      duplicates.add(option);
    }
    flags.add(option);
  }
  return { flags, duplicates: [...duplicates] };
}

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

/**
 * Generate one description per configured site.
 *
 * @param source - Raw description text (normalised here)
 * @returns Descriptions in registry order
 * @throws DescriptionParseError if the source is malformed; nothing is
 *         rendered in that case
 */
export function generateDescriptions(
  source: string,
  options: GenerateOptions
): SiteDescription[] {
  const {
    usernames,
    definedFlags = new Set<string>(),
    registry = DEFAULT_SITE_REGISTRY,
    logger = silentLogger,
  } = options;

  const normalized = normalizeSourceText(source);
  const targets = registry.list().filter((site) => usernames[site.id] !== undefined);

  if (normalized.trim() === "") {
    return targets.map((site) => ({ site: site.id, fileName: site.outputFile, text: "", gaps: [] }));
  }

  const document = parseDescription(normalized, { registry });

  return targets.map((site) => {
    const siteLogger = logger.child({ site: site.id });
    const result = renderDescription(
      document,
      { targetSite: site.id, definedFlags, usernames },
      registry
    );

    for (const gap of result.gaps) {
      siteLogger.warn(
        gap.kind === "self"
          ? "[self] has no username for this site; rendered nothing"
          : "[siteurl] has no entry for this site and no [generic]; rendered nothing",
        { line: gap.position.line, column: gap.position.column }
      );
    }
    siteLogger.debug("Description rendered", { chars: result.text.length });

    return {
      site: site.id,
      fileName: site.outputFile,
      text: finalizeDescription(result.text),
      gaps: result.gaps,
    };
  });
}
