/**
 * Description language: parse once, render per destination site.
 *
 * ```typescript
 * import { parseDescription, renderDescription } from "./description/index.js";
 *
 * const document = parseDescription("Art by [user][fa=Name][/fa][/user]");
 * const { text, gaps } = renderDescription(document, {
 *   targetSite: "weasyl",
 *   definedFlags: new Set(),
 *   usernames: { weasyl: "Me" },
 * });
 * // text === "Art by <fa:Name>"
 * ```
 *
 * For whole-file generation across every configured site, use
 * `generateDescriptions`.
 */

export {
  plainText,
  type DescriptionDocument,
  type DescriptionNode,
  type TextNode,
  type FormatNode,
  type LinkNode,
  type SelfLinkNode,
  type SwitchNode,
  type SwitchKind,
  type SwitchChain,
  type Binding,
  type BindingSite,
  type ConditionalNode,
  type Condition,
  type ConditionParam,
  type ConditionOperator,
  type SourcePosition,
} from "./ast.js";

export { tokenize, locate, type Token } from "./lexer.js";

export {
  parseDescription,
  DescriptionParseError,
  type ParseOptions,
} from "./parser.js";

export {
  resolveChain,
  chainDisplayOverride,
  checkChainBinding,
  selfChain,
  type ResolvedBinding,
  type ResolutionRule,
} from "./chain.js";

export {
  parseCondition,
  evaluateCondition,
  ConditionSyntaxError,
  type ConditionContext,
} from "./conditional.js";

export {
  renderDescription,
  RenderError,
  type RenderContext,
  type RenderResult,
  type ResolutionGap,
} from "./renderer.js";

export {
  generateDescriptions,
  normalizeSourceText,
  finalizeDescription,
  parseDefineOptions,
  DefineOptionError,
  type GenerateOptions,
  type SiteDescription,
} from "./generate.js";
