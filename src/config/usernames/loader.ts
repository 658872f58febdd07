/**
 * Username configuration loader and validator.
 *
 * Responsible for:
 * - Reading the JSON file
 * - Validating its shape with fail-fast behavior
 * - Resolving site aliases to canonical ids
 * - Collecting every problem into one structured error
 * - Freezing the result so renders can share it
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";

import {
  DEFAULT_SITE_REGISTRY,
  type SiteId,
  type SiteRegistry,
} from "../../sites/index.js";
import {
  UsernameConfigFileSchema,
  type UsernameConfig,
} from "./schema.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or one of our own codes */
  code: string;
}

/**
 * Structured validation error for the username configuration.
 */
export class UsernameConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "UsernameConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Username configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Validated configuration plus the keys that were skipped.
 */
export interface LoadedUsernameConfig {
  usernames: UsernameConfig;
  /** Keys that matched no known site. Callers should warn about these. */
  ignoredKeys: string[];
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate a username configuration without throwing.
 */
export function validateUsernameConfig(
  input: unknown,
  registry: SiteRegistry = DEFAULT_SITE_REGISTRY
):
  | { success: true; config: LoadedUsernameConfig }
  | { success: false; errors: ConfigValidationIssue[] } {
  const result = UsernameConfigFileSchema.safeParse(input);
  if (!result.success) {
    return { success: false, errors: formatZodIssues(result.error.issues) };
  }

  const issues: ConfigValidationIssue[] = [];
  const ignoredKeys: string[] = [];
  const usernames: Partial<Record<SiteId, string>> = {};
  const sourceKeys = new Map<SiteId, string>();

  for (const [key, username] of Object.entries(result.data)) {
    const site = registry.resolve(key);
    if (!site) {
      ignoredKeys.push(key);
      continue;
    }

    const previousKey = sourceKeys.get(site.id);
    if (previousKey !== undefined) {
      issues.push({
        path: [key],
        message: `Duplicate entry for website "${site.id}": collides with key "${previousKey}"`,
        code: "duplicate_site",
      });
      continue;
    }

    const problem = site.checkUsername?.(username);
    if (problem) {
      issues.push({ path: [key], message: problem, code: "invalid_username" });
      continue;
    }

    sourceKeys.set(site.id, key);
    usernames[site.id] = username;
  }

  if (issues.length === 0 && sourceKeys.size === 0) {
    issues.push({
      path: [],
      message: "No valid websites found",
      code: "no_sites",
    });
  }

  if (issues.length > 0) {
    return { success: false, errors: issues };
  }

  return {
    success: true,
    config: { usernames: Object.freeze(usernames), ignoredKeys },
  };
}

/**
 * Validate and load a username configuration.
 *
 * @param input - Parsed JSON value
 * @returns Frozen configuration keyed by canonical site id
 * @throws UsernameConfigError if validation fails
 */
export function loadUsernameConfig(
  input: unknown,
  registry: SiteRegistry = DEFAULT_SITE_REGISTRY
): LoadedUsernameConfig {
  const result = validateUsernameConfig(input, registry);
  if (!result.success) {
    throw new UsernameConfigError(
      `Invalid username configuration: ${result.errors.length} validation error(s)`,
      result.errors
    );
  }
  return result.config;
}

/**
 * Read, parse and validate a username configuration file.
 *
 * @throws UsernameConfigError if the file is unreadable, not JSON, or invalid
 */
export function readUsernameConfigFile(
  filePath: string,
  registry: SiteRegistry = DEFAULT_SITE_REGISTRY
): LoadedUsernameConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new UsernameConfigError(`Cannot read configuration file "${filePath}"`, [
      { path: [], message, code: "unreadable" },
    ]);
  }
  return loadUsernameConfig(raw, registry);
}
