/**
 * Description tree.
 *
 * The parser produces one `DescriptionDocument` per source text. Nodes are
 * plain readonly objects; the renderer only reads them, so one tree can be
 * rendered for every destination site.
 */

import type { FormatKind, SiteId } from "../sites/index.js";

/** Location of a tag in the source text, for diagnostics. */
export interface SourcePosition {
  /** 0-based character offset. */
  readonly offset: number;
  /** 1-based line number. */
  readonly line: number;
  /** 1-based column number. */
  readonly column: number;
}

export interface TextNode {
  readonly type: "text";
  readonly value: string;
}

export interface FormatNode {
  readonly type: "format";
  readonly kind: FormatKind;
  readonly children: readonly DescriptionNode[];
}

export interface LinkNode {
  readonly type: "link";
  readonly url: string;
  readonly children: readonly DescriptionNode[];
}

/** `[self][/self]`: a mention of the author, filled in from the username configuration. */
export interface SelfLinkNode {
  readonly type: "self";
  readonly position: SourcePosition;
}

// ---------------------------------------------------------------------------
// Switch chains
// ---------------------------------------------------------------------------

/** Binding target: a concrete site, or the catch-all `generic` entry. */
export type BindingSite = SiteId | "generic";

/**
 * One switch tag of a chain.
 *
 * For site bindings `attribute` is a username (user switches) or a URL
 * (site-url switches); for the generic binding it is always a URL.
 */
export interface Binding {
  readonly site: BindingSite;
  readonly attribute: string;
  /**
   * Text the tag wraps, when it has both an attribute and content.
   * On a site binding this is the chain's display override; on the generic
   * binding it is the generic's own label.
   */
  readonly display?: readonly DescriptionNode[];
}

/** Bindings ordered from the outermost tag to the innermost. */
export interface SwitchChain {
  readonly bindings: readonly Binding[];
}

/** `user` links to profiles; `siteurl` links to raw per-site URLs. */
export type SwitchKind = "user" | "siteurl";

export interface SwitchNode {
  readonly type: "switch";
  readonly kind: SwitchKind;
  readonly chain: SwitchChain;
  readonly position: SourcePosition;
}

// ---------------------------------------------------------------------------
// Conditionals
// ---------------------------------------------------------------------------

export type ConditionParam = "site" | "define";
export type ConditionOperator = "==" | "!=" | "in";

/**
 * Parsed `[if=…]` condition. `operands` holds exactly one value for `==` and
 * `!=`. Site operands are canonical site ids.
 */
export interface Condition {
  readonly param: ConditionParam;
  readonly operator: ConditionOperator;
  readonly operands: readonly string[];
}

export interface ConditionalNode {
  readonly type: "conditional";
  readonly condition: Condition;
  readonly then: readonly DescriptionNode[];
  /** Present only when `[else]` directly follows `[/if]`. */
  readonly else?: readonly DescriptionNode[];
}

export type DescriptionNode =
  | TextNode
  | FormatNode
  | LinkNode
  | SelfLinkNode
  | SwitchNode
  | ConditionalNode;

export interface DescriptionDocument {
  readonly type: "document";
  readonly children: readonly DescriptionNode[];
}

/**
 * Concatenate the text content of a node list, ignoring markup.
 */
export function plainText(nodes: readonly DescriptionNode[]): string {
  let out = "";
  for (const node of nodes) {
    switch (node.type) {
      case "text":
        out += node.value;
        break;
      case "format":
      case "link":
        out += plainText(node.children);
        break;
      default:
        break;
    }
  }
  return out;
}
