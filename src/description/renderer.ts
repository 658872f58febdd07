/**
 * Description renderer.
 *
 * Walks a parsed document once for one destination site and produces that
 * site's text. Rendering never mutates the tree or the registry, so the
 * same document can be rendered for every configured site, in any order.
 *
 * Per node:
 *   - text        → verbatim
 *   - format      → the site's wrapper for that kind, or the bare content
 *                   when the site has none (or the content is blank)
 *   - link        → the site's link markup
 *   - self        → the author's own mention on this site, from the
 *                   username configuration; nothing when unconfigured
 *   - switch      → resolved through `resolveChain`, then rendered as a
 *                   native mention or a profile / raw link
 *   - conditional → then-branch or else-branch
 *
 * Switches that resolve to nothing are reported as resolution gaps next to
 * the output; they never fail the render.
 */

import {
  DEFAULT_SITE_REGISTRY,
  type SiteDescriptor,
  type SiteId,
  type SiteRegistry,
} from "../sites/index.js";
import type { UsernameConfig } from "../config/index.js";
import type {
  DescriptionDocument,
  DescriptionNode,
  SourcePosition,
  SwitchNode,
} from "./ast.js";
import { resolveChain, selfChain, type ResolvedBinding } from "./chain.js";
import { evaluateCondition, type ConditionContext } from "./conditional.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Everything one render depends on. Built once per (document, site) pair.
 */
export interface RenderContext extends ConditionContext {
  readonly targetSite: SiteId;
  readonly definedFlags: ReadonlySet<string>;
  /** The author's usernames, for `[self]`. */
  readonly usernames: UsernameConfig;
}

/**
 * A switch that rendered as nothing at this site.
 *
 *   siteurl: a site-url chain with no entry for the site and no generic
 *   self   : `[self]` with no username configured for the site
 */
export interface ResolutionGap {
  readonly kind: "siteurl" | "self";
  readonly site: SiteId;
  readonly position: SourcePosition;
}

export interface RenderResult {
  readonly text: string;
  readonly gaps: readonly ResolutionGap[];
}

export class RenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RenderError";
  }
}

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

class SiteRenderer {
  readonly gaps: ResolutionGap[] = [];

  constructor(
    private readonly site: SiteDescriptor,
    private readonly context: RenderContext,
    private readonly registry: SiteRegistry
  ) {}

  renderNodes(nodes: readonly DescriptionNode[]): string {
    let out = "";
    for (const node of nodes) {
      out += this.renderNode(node);
    }
    return out;
  }

  private renderNode(node: DescriptionNode): string {
    switch (node.type) {
      case "text":
        return node.value;

      case "format": {
        const content = this.renderNodes(node.children);
        const wrap = this.site.markup.formats[node.kind];
        return wrap === undefined || content.trim() === "" ? content : wrap(content);
      }

      case "link":
        return this.site.markup.link(node.url, this.renderNodes(node.children));

      case "self":
        return this.renderSelf(node.position);

      case "switch":
        return this.renderSwitch(node);

      case "conditional": {
        if (evaluateCondition(node.condition, this.context)) {
          return this.renderNodes(node.then);
        }
        return node.else !== undefined ? this.renderNodes(node.else) : "";
      }
    }
  }

  private gap(kind: ResolutionGap["kind"], position: SourcePosition): string {
    this.gaps.push({ kind, site: this.site.id, position });
    return "";
  }

  /**
   * `[self]` only ever resolves to the author's account on this very site;
   * it does not borrow an account from another configured site.
   */
  private renderSelf(position: SourcePosition): string {
    const chain = selfChain(this.context.usernames, this.registry);
    const resolved = chain && resolveChain(chain, true, this.site.id);
    if (resolved === null || resolved.rule !== "exact") {
      return this.gap("self", position);
    }
    return this.renderUser(resolved);
  }

  private renderSwitch(node: SwitchNode): string {
    const resolved = resolveChain(node.chain, node.kind === "user", this.site.id);
    if (resolved === null) {
      return this.gap("siteurl", node.position);
    }

    if (resolved.site === "generic") {
      return this.site.markup.link(resolved.attribute, this.renderNodes(resolved.display));
    }

    if (node.kind === "user") {
      return this.renderUser(resolved);
    }

    // Site-url binding: the attribute is the URL itself
    return this.site.markup.link(
      resolved.attribute,
      resolved.overridden ? this.renderNodes(resolved.display) : ""
    );
  }

  private renderUser(resolved: ResolvedBinding): string {
    if (resolved.site === "generic") {
      return this.site.markup.link(resolved.attribute, this.renderNodes(resolved.display));
    }

    const owner = this.registry.get(resolved.site);
    if (owner === undefined) {
      throw new RenderError(
        `Site "${resolved.site}" is used in the description but missing from the registry`
      );
    }

    if (!resolved.overridden) {
      const mention = this.site.mention?.(owner, resolved.attribute);
      if (mention !== undefined) {
        return mention;
      }
    }

    return this.site.markup.link(
      owner.profileUrl(resolved.attribute),
      this.renderNodes(resolved.display)
    );
  }
}

/**
 * Render a document for one destination site.
 *
 * @throws RenderError if the target site (or a site the document links to)
 *         is not in `registry`; documents parsed against the same registry
 *         never trigger this
 */
export function renderDescription(
  document: DescriptionDocument,
  context: RenderContext,
  registry: SiteRegistry = DEFAULT_SITE_REGISTRY
): RenderResult {
  const site = registry.get(context.targetSite);
  if (site === undefined) {
    throw new RenderError(`Unknown destination site "${context.targetSite}"`);
  }

  const renderer = new SiteRenderer(site, context, registry);
  const text = renderer.renderNodes(document.children);
  return { text, gaps: renderer.gaps };
}
