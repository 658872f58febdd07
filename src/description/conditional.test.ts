/**
 * Condition parsing and evaluation tests.
 *
 * Run with: npx tsx src/description/conditional.test.ts
 */

import { strict as assert } from "node:assert";

import {
  ConditionSyntaxError,
  evaluateCondition,
  parseCondition,
  type ConditionContext,
} from "./conditional.js";
import { DEFAULT_SITE_REGISTRY, type SiteId } from "../sites/index.js";

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function parse(expression: string) {
  return parseCondition(expression, DEFAULT_SITE_REGISTRY);
}

function at(targetSite: SiteId, ...flags: string[]): ConditionContext {
  return { targetSite, definedFlags: new Set(flags) };
}

function expectSyntaxError(expression: string, reason: string): void {
  assert.throws(
    () => parse(expression),
    (err: unknown) =>
      err instanceof ConditionSyntaxError &&
      err.reason === reason &&
      err.message === `Invalid [if] condition "${expression}": ${reason}`
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Parsing");

test("site == alias resolves to the canonical id", () => {
  assert.deepEqual(parse("site==fa"), { param: "site", operator: "==", operands: ["furaffinity"] });
});

test("spaces around operators are allowed", () => {
  assert.deepEqual(parse(" site != Weasyl "), { param: "site", operator: "!=", operands: ["weasyl"] });
});

test("in takes a comma-separated list", () => {
  assert.deepEqual(parse("site in eka, ib,sf"), {
    param: "site",
    operator: "in",
    operands: ["aryion", "inkbunny", "sofurry"],
  });
});

test("define operands are kept as written", () => {
  assert.deepEqual(parse("DEFINE==Nsfw_1"), { param: "define", operator: "==", operands: ["Nsfw_1"] });
});

section("Syntax Errors");

test("unknown parameter", () => {
  expectSyntaxError("user==fa", 'unknown parameter "user" (allowed: define, site)');
});

test("missing operator", () => {
  expectSyntaxError(
    "site fa",
    'expected "<param> == <value>", "<param> != <value>" or "<param> in <a>,<b>"'
  );
});

test("missing value", () => {
  expectSyntaxError("site==", "missing value");
  expectSyntaxError("define in ,", "missing value");
});

test("unknown site", () => {
  expectSyntaxError("site==deviantart", 'unknown site "deviantart"');
});

test("operands must be identifiers", () => {
  expectSyntaxError("define==a b", '"a b" is not a valid identifier');
});

// ═══════════════════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════════════════

section("Evaluation");

test("site ==", () => {
  const condition = parse("site==fa");
  assert.equal(evaluateCondition(condition, at("furaffinity")), true);
  assert.equal(evaluateCondition(condition, at("weasyl")), false);
});

test("site !=", () => {
  const condition = parse("site!=fa");
  assert.equal(evaluateCondition(condition, at("furaffinity")), false);
  assert.equal(evaluateCondition(condition, at("weasyl")), true);
});

test("site in", () => {
  const condition = parse("site in eka,ib");
  assert.equal(evaluateCondition(condition, at("aryion")), true);
  assert.equal(evaluateCondition(condition, at("inkbunny")), true);
  assert.equal(evaluateCondition(condition, at("sofurry")), false);
});

test("define tests flag membership", () => {
  assert.equal(evaluateCondition(parse("define==nsfw"), at("weasyl", "nsfw")), true);
  assert.equal(evaluateCondition(parse("define==nsfw"), at("weasyl")), false);
  assert.equal(evaluateCondition(parse("define!=nsfw"), at("weasyl")), true);
  assert.equal(evaluateCondition(parse("define in a,b"), at("weasyl", "b")), true);
  assert.equal(evaluateCondition(parse("define in a,b"), at("weasyl", "c")), false);
});

test("flag names are case-sensitive", () => {
  assert.equal(evaluateCondition(parse("define==nsfw"), at("weasyl", "NSFW")), false);
});

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
