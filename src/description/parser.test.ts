/**
 * Description Parser Tests
 *
 * Run with: npx tsx src/description/parser.test.ts
 *
 * These tests verify:
 *   1. Text, formatting, links and [self] produce the expected nodes
 *   2. Switch chains are flattened outermost-first with display overrides
 *   3. Conditionals pair with an [else] only when directly adjacent
 *   4. Every malformed construct fails with a positioned error
 */

import { strict as assert } from "node:assert";

import { parseDescription, DescriptionParseError } from "./parser.js";
import { tokenize, locate } from "./lexer.js";
import type { DescriptionNode, SwitchNode } from "./ast.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

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

function parse(source: string): readonly DescriptionNode[] {
  return parseDescription(source).children;
}

function onlySwitch(source: string): SwitchNode {
  const nodes = parse(source);
  assert.equal(nodes.length, 1);
  const node = nodes[0];
  assert.equal(node.type, "switch");
  if (node.type !== "switch") {
    throw new Error("unreachable");
  }
  return node;
}

function expectParseError(
  source: string,
  reason: string,
  line?: number,
  column?: number
): void {
  assert.throws(
    () => parseDescription(source),
    (err: unknown) => {
      assert.ok(err instanceof DescriptionParseError, "expected DescriptionParseError");
      assert.equal(err.reason, reason);
      if (line !== undefined) {
        assert.equal(err.position.line, line);
      }
      if (column !== undefined) {
        assert.equal(err.position.column, column);
      }
      return true;
    }
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// LEXER
// ═══════════════════════════════════════════════════════════════════════════

section("Lexer");

test("brackets that are not tags stay in the text", () => {
  const tokens = tokenize("[1] and a [ b");
  assert.deepEqual(tokens, [{ kind: "text", value: "[1] and a [ b", start: 0, end: 13 }]);
});

test("tag names are lowercased and attributes trimmed", () => {
  const [open, text, close] = tokenize("[FA= Tester ]x[/Fa]");
  assert.equal(open.kind, "open");
  if (open.kind === "open") {
    assert.equal(open.name, "fa");
    assert.equal(open.attribute, "Tester");
    assert.equal(open.raw, "[FA= Tester ]");
  }
  assert.deepEqual(text, { kind: "text", value: "x", start: 13, end: 14 });
  assert.equal(close.kind, "close");
  assert.equal(close.name, "fa");
});

test("locate reports 1-based line and column", () => {
  assert.deepEqual(locate("ab\ncd", 4), { offset: 4, line: 2, column: 2 });
  assert.deepEqual(locate("ab", 0), { offset: 0, line: 1, column: 1 });
});

// ═══════════════════════════════════════════════════════════════════════════
// BASIC NODES
// ═══════════════════════════════════════════════════════════════════════════

section("Text and Formatting");

test("plain text is a single node", () => {
  assert.deepEqual(parse("Hello world"), [{ type: "text", value: "Hello world" }]);
});

test("empty source has no children", () => {
  assert.deepEqual(parse(""), []);
});

test("format tags nest and are case-insensitive", () => {
  assert.deepEqual(parse("[b]bold [I]both[/i][/B] plain"), [
    {
      type: "format",
      kind: "bold",
      children: [
        { type: "text", value: "bold " },
        { type: "format", kind: "italic", children: [{ type: "text", value: "both" }] },
      ],
    },
    { type: "text", value: " plain" },
  ]);
});

test("underline", () => {
  assert.deepEqual(parse("[u]x[/u]"), [
    { type: "format", kind: "underline", children: [{ type: "text", value: "x" }] },
  ]);
});

section("Links");

test("[url=…] keeps its label", () => {
  assert.deepEqual(parse("[url=https://example.com]Site[/url]"), [
    { type: "link", url: "https://example.com", children: [{ type: "text", value: "Site" }] },
  ]);
});

test("[url] without attribute uses its trimmed text as the URL", () => {
  assert.deepEqual(parse("[url] https://example.com [/url]"), [
    { type: "link", url: "https://example.com", children: [] },
  ]);
});

test("link labels may contain formatting", () => {
  assert.deepEqual(parse("[url=https://example.com][b]Site[/b][/url]"), [
    {
      type: "link",
      url: "https://example.com",
      children: [{ type: "format", kind: "bold", children: [{ type: "text", value: "Site" }] }],
    },
  ]);
});

section("[self]");

test("[self][/self] records its position", () => {
  assert.deepEqual(parse("By [self][/self]"), [
    { type: "text", value: "By " },
    { type: "self", position: { offset: 3, line: 1, column: 4 } },
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// SWITCHES
// ═══════════════════════════════════════════════════════════════════════════

section("Switch Chains");

test("[user] with a single site binding", () => {
  const node = onlySwitch("[user][fa=Tester][/fa][/user]");
  assert.equal(node.kind, "user");
  assert.deepEqual(node.chain.bindings, [{ site: "furaffinity", attribute: "Tester" }]);
  assert.deepEqual(node.position, { offset: 0, line: 1, column: 1 });
});

test("nested [siteurl] chain, outermost first, with display override", () => {
  const node = onlySwitch(
    "[siteurl][sf=https://sf.example][eka=https://eka.example]Text[/eka][/sf][/siteurl]"
  );
  assert.equal(node.kind, "siteurl");
  assert.deepEqual(node.chain.bindings, [
    { site: "sofurry", attribute: "https://sf.example" },
    {
      site: "aryion",
      attribute: "https://eka.example",
      display: [{ type: "text", value: "Text" }],
    },
  ]);
});

test("switch tag text without an attribute becomes the attribute", () => {
  const node = onlySwitch("[eka]Lorem[/eka]");
  assert.equal(node.kind, "user");
  assert.deepEqual(node.chain.bindings, [{ site: "aryion", attribute: "Lorem" }]);
});

test("a bare switch tag is an implicit [user]", () => {
  const node = onlySwitch("[IB=Tester][/ib]");
  assert.equal(node.kind, "user");
  assert.deepEqual(node.chain.bindings, [{ site: "inkbunny", attribute: "Tester" }]);
});

test("display text is trimmed", () => {
  const node = onlySwitch("[fa=Tester]  Shown  [/fa]");
  assert.deepEqual(node.chain.bindings, [
    { site: "furaffinity", attribute: "Tester", display: [{ type: "text", value: "Shown" }] },
  ]);
});

test("generic keeps its own label", () => {
  const node = onlySwitch("[fa=Tester][generic=https://example.com]Label[/generic][/fa]");
  assert.deepEqual(node.chain.bindings, [
    { site: "furaffinity", attribute: "Tester" },
    { site: "generic", attribute: "https://example.com", display: [{ type: "text", value: "Label" }] },
  ]);
});

test("[siteurl] skips username checks", () => {
  const node = onlySwitch(
    "[siteurl][mastodon=https://example.social/@tester][/mastodon][/siteurl]"
  );
  assert.deepEqual(node.chain.bindings, [
    { site: "mastodon", attribute: "https://example.social/@tester" },
  ]);
});

test("switches inside formatting", () => {
  const nodes = parse("[b][fa=Tester][/fa][/b]");
  assert.equal(nodes.length, 1);
  const format = nodes[0];
  assert.equal(format.type, "format");
  if (format.type === "format") {
    assert.equal(format.children[0].type, "switch");
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// CONDITIONALS
// ═══════════════════════════════════════════════════════════════════════════

section("Conditionals");

test("[if] with an adjacent [else]", () => {
  assert.deepEqual(parse("[if=site==fa]A[/if][else]B[/else]"), [
    {
      type: "conditional",
      condition: { param: "site", operator: "==", operands: ["furaffinity"] },
      then: [{ type: "text", value: "A" }],
      else: [{ type: "text", value: "B" }],
    },
  ]);
});

test("[if] without [else]", () => {
  assert.deepEqual(parse("[if=define in nsfw,gore]A[/if]"), [
    {
      type: "conditional",
      condition: { param: "define", operator: "in", operands: ["nsfw", "gore"] },
      then: [{ type: "text", value: "A" }],
    },
  ]);
});

test("[if] may contain switches", () => {
  const nodes = parse("[if=site!=weasyl][user][fa=Tester][/fa][/user][/if]");
  const conditional = nodes[0];
  assert.equal(conditional.type, "conditional");
  if (conditional.type === "conditional") {
    assert.equal(conditional.then[0].type, "switch");
  }
});

test("whitespace between [/if] and [else] is an error", () => {
  expectParseError(
    "[if=site==fa]A[/if] [else]B[/else]",
    "[else] must directly follow a closing [/if] tag",
    1,
    21
  );
});

test("a stray [else] is an error", () => {
  expectParseError("[else]B[/else]", "[else] must directly follow a closing [/if] tag", 1, 1);
});

test("[if] without a condition", () => {
  expectParseError("[if]x[/if]", "[if] requires a condition, e.g. [if=site==fa]");
});

test("unknown site in a condition", () => {
  expectParseError(
    "[if=site==deviantart]x[/if]",
    'Invalid [if] condition "site==deviantart": unknown site "deviantart"'
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════

section("Structural Errors");

test("unknown tag", () => {
  expectParseError("Hello [foo]x[/foo]", "Unknown tag [foo]", 1, 7);
});

test("positions count lines", () => {
  expectParseError("line one\n[foo]", "Unknown tag [foo]", 2, 1);
});

test("unclosed tag", () => {
  expectParseError("[b]x", "Unclosed tag [b]", 1, 1);
});

test("mismatched closing tag", () => {
  expectParseError("[b]x[/i]", "Expected [/b] but found [/i]", 1, 5);
});

test("unexpected closing tag", () => {
  expectParseError("x[/b]", "Unexpected closing tag [/b]", 1, 2);
});

test("formatting tags take no attribute", () => {
  expectParseError("[b=1]x[/b]", "[b] does not take an attribute");
});

test("closing tags take no attribute", () => {
  expectParseError("[b]x[/b=1]", "Closing tag [/b=1] cannot have an attribute", 1, 5);
});

test("message carries the position", () => {
  try {
    parseDescription("x[/b]");
    assert.fail("expected an error");
  } catch (err) {
    assert.ok(err instanceof DescriptionParseError);
    assert.equal(err.message, "Unexpected closing tag [/b] (line 1, col 2)");
  }
});

section("Tag-Specific Errors");

test("[self] must be empty", () => {
  expectParseError("[self]x[/self]", "[self] must be empty: write [self][/self]", 1, 7);
});

test("[url] needs a URL", () => {
  expectParseError("[url][/url]", "[url] requires a URL: [url=https://…]text[/url]");
});

test("only text and formatting inside link labels", () => {
  expectParseError(
    "[url=https://example.com][self][/self][/url]",
    "[self] is not allowed here: switch tag text and link labels may only contain text and [b], [i], [u]",
    1,
    26
  );
});

test("[user] must start with a switch tag", () => {
  expectParseError(
    "[user]Tester[/user]",
    "[user] must directly contain a switch tag (a site tag or [generic]), not text",
    1,
    7
  );
});

test("[user] takes no attribute", () => {
  expectParseError("[user=x][fa=A][/fa][/user]", "[user] does not take an attribute");
});

test("[user] holds a single chain", () => {
  expectParseError(
    "[user][fa=A][/fa][ib=B][/ib][/user]",
    "[user] may only contain a single switch tag chain",
    1,
    18
  );
});

test("a switch tag wrapping another needs an attribute", () => {
  expectParseError(
    "[fa][ib=B][/ib][/fa]",
    "[fa] wraps another switch tag, so it needs an attribute: [fa=…]",
    1,
    1
  );
});

test("nested switch tag plus text is an error", () => {
  expectParseError(
    "[fa=A][ib=B][/ib] text[/fa]",
    "[fa=A] may only contain one nested switch tag and no text",
    1,
    18
  );
});

test("[generic] requires an attribute", () => {
  expectParseError(
    "[generic]label[/generic]",
    "[generic] requires a URL attribute: [generic=https://…]text[/generic]"
  );
});

test("switch tag with neither attribute nor text", () => {
  expectParseError("[fa][/fa]", "[fa] needs an attribute or text content");
});

test("two generics in one chain", () => {
  expectParseError(
    "[fa=A][generic=https://a.example][generic=https://b.example][/generic][/generic][/fa]",
    "A switch chain can only contain one [generic] tag"
  );
});

test("the same site twice in one chain", () => {
  expectParseError(
    "[fa=A][fa=B][/fa][/fa]",
    'Duplicate switch tag for site "furaffinity" in the same chain',
    1,
    7
  );
});

test("aliases of the same site collide", () => {
  expectParseError(
    "[eka=A][aryion=B][/aryion][/eka]",
    'Duplicate switch tag for site "aryion" in the same chain'
  );
});

test("mastodon usernames are checked in user chains", () => {
  expectParseError(
    "[mastodon=tester][/mastodon]",
    'Mastodon username "tester" must look like user@instance'
  );
});

test("switch tag text may not contain links", () => {
  expectParseError(
    "[fa=A][url=https://example.com]x[/url][/fa]",
    "[url=https://example.com] is not allowed here: switch tag text and link labels may only contain text and [b], [i], [u]"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
