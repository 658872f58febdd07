/**
 * Destination site identifiers.
 *
 * These are the canonical ids used everywhere after alias resolution:
 * tag names, username configuration keys and `[if=site==…]` operands all
 * normalise to one of these.
 */

import { z } from "zod";

export const SiteId = z.enum([
  "aryion",
  "furaffinity",
  "weasyl",
  "inkbunny",
  "sofurry",
  "twitter",
  "mastodon",
]);
export type SiteId = z.infer<typeof SiteId>;

/** Basic formatting kinds a site may (or may not) support. */
export const FormatKind = z.enum(["bold", "italic", "underline"]);
export type FormatKind = z.infer<typeof FormatKind>;
