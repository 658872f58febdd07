/**
 * Description parser.
 *
 * Turns tagged description text into a `DescriptionDocument`. Parsing is
 * strict: the first malformed construct aborts the whole document with a
 * `DescriptionParseError` naming the offending tag and where it is.
 *
 * TAGS:
 *
 *   FORMATTING
 *     [b]…[/b]  [i]…[/i]  [u]…[/u]
 *     [url=https://…]text[/url]     [url]https://…[/url]
 *
 *   AUTHOR
 *     [self][/self]                 must be empty
 *
 *   SWITCHES
 *     [user][fa=Name]Shown[/fa][/user]
 *     [siteurl][sf=https://…][eka=https://…]Text[/eka][/sf][/siteurl]
 *     [fa=Name][/fa]                bare switch tag = implicit [user]
 *
 *     A switch tag holds either exactly one nested switch tag or plain
 *     text (with optional formatting). Without an attribute, the text is
 *     the attribute: [eka]Lorem[/eka] is [eka=Lorem][/eka].
 *     [generic=URL]label[/generic] is the catch-all entry.
 *
 *   CONDITIONALS
 *     [if=site==fa]…[/if][else]…[/else]
 *     [if=define in a,b]…[/if]
 */

import { DEFAULT_SITE_REGISTRY, type SiteRegistry } from "../sites/index.js";
import type {
  Binding,
  BindingSite,
  Condition,
  ConditionalNode,
  DescriptionDocument,
  DescriptionNode,
  SourcePosition,
  SwitchKind,
  SwitchNode,
} from "./ast.js";
import { plainText } from "./ast.js";
import { checkChainBinding } from "./chain.js";
import { ConditionSyntaxError, parseCondition } from "./conditional.js";
import { locate, tokenize, type OpenTagToken, type Token } from "./lexer.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class DescriptionParseError extends Error {
  constructor(
    public readonly reason: string,
    public readonly position: SourcePosition
  ) {
    super(`${reason} (line ${position.line}, col ${position.column})`);
    this.name = "DescriptionParseError";
  }
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ParseOptions {
  /** Registry used to recognise site tags and `[if=site…]` operands. */
  registry?: SiteRegistry;
}

/**
 * Content allowed at a point in the tree. Inside switch-tag text and link
 * labels only text and formatting make sense.
 */
type Mode = "block" | "inline";

const FORMAT_TAGS = {
  b: "bold",
  i: "italic",
  u: "underline",
} as const;

function isFormatTag(name: string): name is keyof typeof FORMAT_TAGS {
  return Object.prototype.hasOwnProperty.call(FORMAT_TAGS, name);
}

/**
 * Trim leading whitespace of the first text node and trailing whitespace
 * of the last one, dropping nodes left empty.
 */
function trimNodes(nodes: readonly DescriptionNode[]): DescriptionNode[] {
  const out = [...nodes];
  const first = out[0];
  if (first?.type === "text") {
    out[0] = { type: "text", value: first.value.trimStart() };
  }
  const lastIndex = out.length - 1;
  const last = out[lastIndex];
  if (last?.type === "text") {
    out[lastIndex] = { type: "text", value: last.value.trimEnd() };
  }
  return out.filter((node) => node.type !== "text" || node.value !== "");
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

class DescriptionParser {
  private pos = 0;
  private readonly tokens: Token[];

  constructor(
    private readonly source: string,
    private readonly registry: SiteRegistry
  ) {
    this.tokens = tokenize(source);
  }

  parse(): DescriptionDocument {
    return { type: "document", children: this.parseNodes(null, "block") };
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private error(reason: string, offset: number): DescriptionParseError {
    return new DescriptionParseError(reason, locate(this.source, offset));
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private isSwitchTag(name: string): boolean {
    return name === "generic" || this.registry.resolve(name) !== undefined;
  }

  private bindingSite(name: string): BindingSite {
    if (name === "generic") {
      return "generic";
    }
    const site = this.registry.resolve(name);
    if (site === undefined) {
      throw new Error(`bindingSite called with non-switch tag "${name}"`);
    }
    return site.id;
  }

  private rejectAttribute(token: OpenTagToken): void {
    if (token.attribute !== undefined) {
      throw this.error(`[${token.name}] does not take an attribute`, token.start);
    }
  }

  /**
   * Consume the closing tag of `open`, which must be the very next token.
   */
  private expectClose(open: OpenTagToken, reason: string): void {
    const next = this.peek();
    if (next === undefined) {
      throw this.error(`Unclosed tag ${open.raw}`, open.start);
    }
    if (next.kind !== "close" || next.name !== open.name) {
      throw this.error(reason, next.start);
    }
    if (next.attribute !== undefined) {
      throw this.error(`Closing tag ${next.raw} cannot have an attribute`, next.start);
    }
    this.pos++;
  }

  // -------------------------------------------------------------------------
  // Node lists
  // -------------------------------------------------------------------------

  /**
   * Parse nodes until the closing tag of `closing` (consumed), or until the
   * end of input when `closing` is null.
   */
  private parseNodes(closing: OpenTagToken | null, mode: Mode): DescriptionNode[] {
    const nodes: DescriptionNode[] = [];

    while (this.pos < this.tokens.length) {
      const token = this.tokens[this.pos];

      if (token.kind === "text") {
        this.pos++;
        nodes.push({ type: "text", value: token.value });
        continue;
      }

      if (token.kind === "close") {
        if (closing !== null && token.name === closing.name) {
          if (token.attribute !== undefined) {
            throw this.error(`Closing tag ${token.raw} cannot have an attribute`, token.start);
          }
          this.pos++;
          return nodes;
        }
        throw this.error(
          closing !== null
            ? `Expected [/${closing.name}] but found ${token.raw}`
            : `Unexpected closing tag ${token.raw}`,
          token.start
        );
      }

      this.pos++;
      nodes.push(this.parseTag(token, mode));
    }

    if (closing !== null) {
      throw this.error(`Unclosed tag ${closing.raw}`, closing.start);
    }
    return nodes;
  }

  // -------------------------------------------------------------------------
  // Tags
  // -------------------------------------------------------------------------

  private parseTag(token: OpenTagToken, mode: Mode): DescriptionNode {
    const name = token.name;

    if (isFormatTag(name)) {
      this.rejectAttribute(token);
      return {
        type: "format",
        kind: FORMAT_TAGS[name],
        children: this.parseNodes(token, mode),
      };
    }

    if (name === "else") {
      throw this.error("[else] must directly follow a closing [/if] tag", token.start);
    }

    const known =
      name === "url" ||
      name === "self" ||
      name === "user" ||
      name === "siteurl" ||
      name === "if" ||
      this.isSwitchTag(name);
    if (!known) {
      throw this.error(`Unknown tag ${token.raw}`, token.start);
    }

    if (mode === "inline") {
      throw this.error(
        `${token.raw} is not allowed here: switch tag text and link labels may only contain text and [b], [i], [u]`,
        token.start
      );
    }

    switch (name) {
      case "url":
        return this.parseLink(token);
      case "self":
        this.rejectAttribute(token);
        this.expectClose(token, "[self] must be empty: write [self][/self]");
        return { type: "self", position: locate(this.source, token.start) };
      case "user":
        return this.parseWrapper(token, "user");
      case "siteurl":
        return this.parseWrapper(token, "siteurl");
      case "if":
        return this.parseConditional(token);
      default:
        return this.switchNode("user", this.parseChain(token, "user", []), token);
    }
  }

  private parseLink(token: OpenTagToken): DescriptionNode {
    const children = this.parseNodes(token, "inline");
    const url = token.attribute || plainText(children).trim();
    if (url === "") {
      throw this.error("[url] requires a URL: [url=https://…]text[/url]", token.start);
    }
    return { type: "link", url, children: token.attribute ? children : [] };
  }

  // -------------------------------------------------------------------------
  // Switches
  // -------------------------------------------------------------------------

  private switchNode(
    kind: SwitchKind,
    bindings: Binding[],
    token: OpenTagToken
  ): SwitchNode {
    return {
      type: "switch",
      kind,
      chain: { bindings },
      position: locate(this.source, token.start),
    };
  }

  /**
   * `[user]` / `[siteurl]`: exactly one chain, nothing else.
   */
  private parseWrapper(token: OpenTagToken, kind: SwitchKind): SwitchNode {
    this.rejectAttribute(token);

    const first = this.peek();
    if (first === undefined || first.kind !== "open" || !this.isSwitchTag(first.name)) {
      throw this.error(
        `[${kind}] must directly contain a switch tag (a site tag or [generic]), not text`,
        first?.start ?? token.start
      );
    }
    this.pos++;

    const bindings = this.parseChain(first, kind, []);
    this.expectClose(token, `[${kind}] may only contain a single switch tag chain`);
    return this.switchNode(kind, bindings, token);
  }

  /**
   * Parse a switch tag (already consumed) and everything nested in it.
   *
   * @param outer - Bindings of the enclosing tags, outermost first
   * @returns This tag's binding followed by the nested ones
   */
  private parseChain(
    token: OpenTagToken,
    kind: SwitchKind,
    outer: readonly Binding[]
  ): Binding[] {
    const site = this.bindingSite(token.name);
    const next = this.peek();

    if (next !== undefined && next.kind === "open" && this.isSwitchTag(next.name)) {
      if (!token.attribute) {
        throw this.error(
          `${token.raw} wraps another switch tag, so it needs an attribute: [${token.name}=…]`,
          token.start
        );
      }
      const binding: Binding = { site, attribute: token.attribute };
      this.checkBinding(outer, binding, kind, token);

      this.pos++;
      const inner = this.parseChain(next, kind, [...outer, binding]);
      this.expectClose(
        token,
        `${token.raw} may only contain one nested switch tag and no text`
      );
      return [binding, ...inner];
    }

    const children = this.parseNodes(token, "inline");
    const text = plainText(children).trim();

    let binding: Binding;
    if (token.attribute) {
      binding =
        text === ""
          ? { site, attribute: token.attribute }
          : { site, attribute: token.attribute, display: trimNodes(children) };
    } else if (site === "generic") {
      throw this.error(
        "[generic] requires a URL attribute: [generic=https://…]text[/generic]",
        token.start
      );
    } else if (text === "") {
      throw this.error(
        `${token.raw} needs an attribute or text content`,
        token.start
      );
    } else {
      binding = { site, attribute: text };
    }

    this.checkBinding(outer, binding, kind, token);
    return [binding];
  }

  private checkBinding(
    outer: readonly Binding[],
    binding: Binding,
    kind: SwitchKind,
    token: OpenTagToken
  ): void {
    const chainProblem = checkChainBinding(outer, binding);
    if (chainProblem !== undefined) {
      throw this.error(chainProblem, token.start);
    }

    if (kind === "user" && binding.site !== "generic") {
      const usernameProblem = this.registry.get(binding.site)?.checkUsername?.(binding.attribute);
      if (usernameProblem !== undefined) {
        throw this.error(usernameProblem, token.start);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Conditionals
  // -------------------------------------------------------------------------

  private parseConditional(token: OpenTagToken): ConditionalNode {
    if (!token.attribute) {
      throw this.error("[if] requires a condition, e.g. [if=site==fa]", token.start);
    }

    let condition: Condition;
    try {
      condition = parseCondition(token.attribute, this.registry);
    } catch (err) {
      if (err instanceof ConditionSyntaxError) {
        throw this.error(err.message, token.start);
      }
      throw err;
    }

    const then = this.parseNodes(token, "block");
    const closeEnd = this.tokens[this.pos - 1].end;

    const next = this.peek();
    if (next !== undefined && next.kind === "open" && next.name === "else" && next.start === closeEnd) {
      this.rejectAttribute(next);
      this.pos++;
      return {
        type: "conditional",
        condition,
        then,
        else: this.parseNodes(next, "block"),
      };
    }

    return { type: "conditional", condition, then };
  }
}

/**
 * Parse a description source into a tree.
 *
 * @throws DescriptionParseError on the first malformed construct
 */
export function parseDescription(
  source: string,
  options: ParseOptions = {}
): DescriptionDocument {
  const { registry = DEFAULT_SITE_REGISTRY } = options;
  return new DescriptionParser(source, registry).parse();
}
