/**
 * Username configuration schema.
 *
 * The configuration file is a flat JSON object from site identifier to the
 * author's username on that site:
 *
 *   {
 *     "fa": "MyName",
 *     "inkbunny": "MyName",
 *     "mastodon": "myname@example.social"
 *   }
 *
 * Keys are aliases and are resolved against the site registry by the
 * loader; this schema only checks the shape.
 */

import { z } from "zod";
import type { SiteId } from "../../sites/index.js";

export const UsernameConfigFileSchema = z.record(
  z.string(),
  z
    .string({
      invalid_type_error: "Username must be a string",
    })
    .trim()
    .min(1, "Username must not be blank")
    .describe("Username of the author on this site")
);

export type UsernameConfigFile = z.infer<typeof UsernameConfigFileSchema>;

/**
 * Validated username configuration keyed by canonical site id.
 * A site that is absent gets no description.
 */
export type UsernameConfig = Readonly<Partial<Record<SiteId, string>>>;
