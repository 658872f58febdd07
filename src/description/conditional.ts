/**
 * `[if=…]` condition parsing and evaluation.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SUPPORTED SYNTAX
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   [if=site==fa]…[/if]              destination is Fur Affinity
 *   [if=site != weasyl]…[/if]        destination is anything but Weasyl
 *   [if=site in eka,fa]…[/if]        destination is one of the listed sites
 *   [if=define==nsfw]…[/if]          flag "nsfw" was passed on the command line
 *   [if=define in a,b]…[/if]         at least one of the flags was passed
 *
 *   An [else]…[/else] placed directly after [/if] (nothing in between, not
 *   even a space) renders when the condition is false.
 *
 * Site operands are resolved through the registry's aliases at parse time;
 * define operands are opaque flag names.
 */

import type { SiteId, SiteRegistry } from "../sites/index.js";
import type { Condition, ConditionOperator, ConditionParam } from "./ast.js";

/** Context a condition is evaluated against. */
export interface ConditionContext {
  readonly targetSite: SiteId;
  readonly definedFlags: ReadonlySet<string>;
}

export class ConditionSyntaxError extends Error {
  constructor(
    public readonly expression: string,
    public readonly reason: string
  ) {
    super(`Invalid [if] condition "${expression}": ${reason}`);
    this.name = "ConditionSyntaxError";
  }
}

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

/**
 * Groups:
 *   1: parameter name
 *   2: "==" or "!=", when used
 *   3: "in", when used
 *   4: operand text
 */
const CONDITION_RE = /^\s*([A-Za-z]+)\s*(?:(==|!=)|\s(in)\s)\s*(.*?)\s*$/i;

const IDENTIFIER_RE = /^[A-Za-z0-9_-]+$/;

const PARAMS: Readonly<Record<string, ConditionParam>> = {
  site: "site",
  define: "define",
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse the attribute of an `[if=…]` tag.
 *
 * @throws ConditionSyntaxError on an unknown parameter, malformed operator,
 *         missing operand or unknown site
 */
export function parseCondition(
  expression: string,
  registry: SiteRegistry
): Condition {
  const match = CONDITION_RE.exec(expression);
  if (match === null) {
    throw new ConditionSyntaxError(
      expression,
      'expected "<param> == <value>", "<param> != <value>" or "<param> in <a>,<b>"'
    );
  }

  const [, rawParam, symbolOp, inOp, operandText] = match;
  const param = PARAMS[rawParam.toLowerCase()];
  if (param === undefined) {
    throw new ConditionSyntaxError(
      expression,
      `unknown parameter "${rawParam}" (allowed: define, site)`
    );
  }

  const operator: ConditionOperator = inOp !== undefined ? "in" : symbolOp === "!=" ? "!=" : "==";

  const rawOperands =
    operator === "in"
      ? operandText.split(",").map((s) => s.trim()).filter((s) => s !== "")
      : [operandText];

  if (rawOperands.length === 0 || rawOperands[0] === "") {
    throw new ConditionSyntaxError(expression, "missing value");
  }

  const operands: string[] = [];
  for (const operand of rawOperands) {
    if (!IDENTIFIER_RE.test(operand)) {
      throw new ConditionSyntaxError(expression, `"${operand}" is not a valid identifier`);
    }
    if (param === "site") {
      const site = registry.resolve(operand);
      if (site === undefined) {
        throw new ConditionSyntaxError(expression, `unknown site "${operand}"`);
      }
      operands.push(site.id);
    } else {
      operands.push(operand);
    }
  }

  return { param, operator, operands };
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/**
 * Evaluate a parsed condition.
 *
 * Rules:
 *   - site ==  → destination equals the operand
 *   - site !=  → destination differs from the operand
 *   - site in  → destination is one of the operands
 *   - define == / != / in → same, tested as membership in the defined flags
 */
export function evaluateCondition(
  condition: Condition,
  context: ConditionContext
): boolean {
  const matches =
    condition.param === "site"
      ? (operand: string) => operand === context.targetSite
      : (operand: string) => context.definedFlags.has(operand);

  switch (condition.operator) {
    case "==":
    case "in":
      return condition.operands.some(matches);

    case "!=":
      return !condition.operands.some(matches);
  }
}
