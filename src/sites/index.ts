/**
 * Destination sites: ids, markup dialects, descriptors and the registry.
 */

export { SiteId, FormatKind } from "./enums.js";
export { BBCODE, MARKDOWN, PLAINTEXT, type SiteMarkup } from "./markup.js";
export {
  BUILTIN_SITES,
  parseMastodonHandle,
  type SiteDescriptor,
  type MastodonHandle,
} from "./catalog.js";
export {
  SiteRegistry,
  SiteRegistryError,
  DEFAULT_SITE_REGISTRY,
} from "./registry.js";
