/**
 * Site registry with alias indexing.
 *
 * The registry is the single lookup point for destination sites during
 * parsing and rendering. It is built once from a list of descriptors and is
 * read-only afterwards, so one instance can be shared by every per-site
 * render of a document.
 *
 * Lookups:
 *   - by canonical id ("furaffinity")
 *   - by alias, case-insensitive ("FA", "fa", "FurAffinity")
 */

import type { SiteId } from "./enums.js";
import { BUILTIN_SITES, type SiteDescriptor } from "./catalog.js";

export class SiteRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SiteRegistryError";
  }
}

/**
 * Immutable registry of destination sites.
 *
 * @example
 *   const registry = SiteRegistry.create(BUILTIN_SITES);
 *   registry.resolve("FA")?.id;   // "furaffinity"
 *   registry.get("weasyl")?.markup.name;  // "markdown"
 */
export class SiteRegistry {
  private readonly _sites: ReadonlyArray<SiteDescriptor>;
  private readonly _byId: ReadonlyMap<SiteId, SiteDescriptor>;
  private readonly _byAlias: ReadonlyMap<string, SiteDescriptor>;

  private constructor(sites: ReadonlyArray<SiteDescriptor>) {
    const byId = new Map<SiteId, SiteDescriptor>();
    const byAlias = new Map<string, SiteDescriptor>();

    for (const site of sites) {
      if (byId.has(site.id)) {
        throw new SiteRegistryError(`Site "${site.id}" is registered twice`);
      }
      byId.set(site.id, site);

      for (const alias of [site.id, ...site.aliases]) {
        const key = alias.toLowerCase();
        const existing = byAlias.get(key);
        if (existing && existing.id !== site.id) {
          throw new SiteRegistryError(
            `Alias "${key}" is claimed by both "${existing.id}" and "${site.id}"`
          );
        }
        byAlias.set(key, site);
      }
    }

    this._sites = Object.freeze([...sites]);
    this._byId = byId;
    this._byAlias = byAlias;
  }

  /**
   * Build a registry, rejecting duplicate ids and colliding aliases.
   */
  static create(sites: ReadonlyArray<SiteDescriptor>): SiteRegistry {
    return new SiteRegistry(sites);
  }

  /** Look up a site by alias or id (case-insensitive). */
  resolve(alias: string): SiteDescriptor | undefined {
    return this._byAlias.get(alias.trim().toLowerCase());
  }

  get(id: SiteId): SiteDescriptor | undefined {
    return this._byId.get(id);
  }

  has(id: SiteId): boolean {
    return this._byId.has(id);
  }

  /** All sites in registration order. */
  list(): ReadonlyArray<SiteDescriptor> {
    return this._sites;
  }

  /** Every known alias, sorted. */
  aliases(): string[] {
    return [...this._byAlias.keys()].sort();
  }
}

/** Registry of the built-in sites. */
export const DEFAULT_SITE_REGISTRY: SiteRegistry = SiteRegistry.create(BUILTIN_SITES);
