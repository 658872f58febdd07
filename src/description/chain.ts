/**
 * Switch-chain resolution.
 *
 * A chain is the nesting of site-specific switch tags, outermost first:
 *
 *   [fa=Elit][generic=https://example.com]Bad Manners[/generic][/fa]
 *     → bindings: fa=Elit, generic=https://example.com ("Bad Manners")
 *
 * For each destination, `resolveChain` picks the binding that applies:
 *
 *   1. EXACT    : a binding for the destination itself
 *   2. GENERIC  : the `generic` binding, its attribute used as a literal URL
 *   3. INNERMOST: user chains only: the innermost binding, linked to its
 *                  own site's profile
 *   4. nothing  : site-url chains with no match and no generic
 *
 * Generic outranks innermost and loses to an exact match. The function is
 * pure and total, so every case can be tested without rendering.
 */

import type { SiteId, SiteRegistry } from "../sites/index.js";
import type { UsernameConfig } from "../config/index.js";
import type { Binding, DescriptionNode, SwitchChain } from "./ast.js";

export type ResolutionRule = "exact" | "generic" | "innermost";

interface ResolvedBase {
  readonly rule: ResolutionRule;
  readonly attribute: string;
  /** Nodes to show as the link text. */
  readonly display: readonly DescriptionNode[];
  /**
   * True when `display` came from tag content rather than echoing the
   * attribute. Sites only use their native mention syntax when false.
   */
  readonly overridden: boolean;
}

export interface ResolvedSiteBinding extends ResolvedBase {
  readonly rule: "exact" | "innermost";
  /** Site the attribute belongs to (the link points at this site). */
  readonly site: SiteId;
}

export interface ResolvedGenericBinding extends ResolvedBase {
  readonly rule: "generic";
  readonly site: "generic";
}

export type ResolvedBinding = ResolvedSiteBinding | ResolvedGenericBinding;

/**
 * The chain's display override: content of the innermost site binding
 * that wraps text. Generic labels are not overrides.
 */
export function chainDisplayOverride(
  chain: SwitchChain
): readonly DescriptionNode[] | undefined {
  for (let i = chain.bindings.length - 1; i >= 0; i--) {
    const binding = chain.bindings[i];
    if (binding.site !== "generic" && binding.display !== undefined) {
      return binding.display;
    }
  }
  return undefined;
}

function echo(attribute: string): readonly DescriptionNode[] {
  return [{ type: "text", value: attribute }];
}

function resolveSite(
  rule: "exact" | "innermost",
  site: SiteId,
  binding: Binding,
  override: readonly DescriptionNode[] | undefined
): ResolvedSiteBinding {
  return {
    rule,
    site,
    attribute: binding.attribute,
    display: override ?? echo(binding.attribute),
    overridden: override !== undefined,
  };
}

/**
 * Pick the binding of `chain` that applies at `targetSite`.
 *
 * @param isUserChain - user chains fall back to their innermost binding;
 *                      site-url chains resolve to null instead
 * @returns The winning binding, or null when nothing should be emitted
 */
export function resolveChain(
  chain: SwitchChain,
  isUserChain: boolean,
  targetSite: SiteId
): ResolvedBinding | null {
  const override = chainDisplayOverride(chain);

  const exact = chain.bindings.find((b) => b.site === targetSite);
  if (exact !== undefined) {
    return resolveSite("exact", targetSite, exact, override);
  }

  const generic = chain.bindings.find((b) => b.site === "generic");
  if (generic !== undefined) {
    const display = generic.display ?? override ?? [];
    return {
      rule: "generic",
      site: "generic",
      attribute: generic.attribute,
      display,
      overridden: display.length > 0,
    };
  }

  if (isUserChain) {
    const innermost = chain.bindings[chain.bindings.length - 1];
    if (innermost !== undefined && innermost.site !== "generic") {
      return resolveSite("innermost", innermost.site, innermost, override);
    }
  }

  return null;
}

/**
 * Problem with adding `binding` to a chain that already holds `existing`,
 * or undefined when the chain stays well-formed.
 */
export function checkChainBinding(
  existing: readonly Binding[],
  binding: Binding
): string | undefined {
  if (binding.site === "generic") {
    return existing.some((b) => b.site === "generic")
      ? "A switch chain can only contain one [generic] tag"
      : undefined;
  }
  return existing.some((b) => b.site === binding.site)
    ? `Duplicate switch tag for site "${binding.site}" in the same chain`
    : undefined;
}

/**
 * Synthetic user chain standing for the author: one binding per configured
 * site, in registry order, with no generic and no display override.
 *
 * @returns null when no registered site has a username configured
 */
export function selfChain(
  usernames: UsernameConfig,
  registry: SiteRegistry
): SwitchChain | null {
  const bindings: Binding[] = [];
  for (const site of registry.list()) {
    const username = usernames[site.id];
    if (username !== undefined) {
      bindings.push({ site: site.id, attribute: username });
    }
  }
  return bindings.length > 0 ? { bindings } : null;
}
