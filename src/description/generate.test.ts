/**
 * Description generation tests.
 *
 * Run with: npx tsx src/description/generate.test.ts
 *
 * Tests cover:
 *   1. Source normalisation and output finalisation
 *   2. -D option validation
 *   3. One description per configured site, in registry order
 *   4. Gap warnings go through the logger
 */

import { strict as assert } from "node:assert";

import {
  DefineOptionError,
  finalizeDescription,
  generateDescriptions,
  normalizeSourceText,
  parseDefineOptions,
} from "./generate.js";
import { DescriptionParseError } from "./parser.js";
import { createLogger, type LogLevel } from "../logging/index.js";

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

// ═══════════════════════════════════════════════════════════════════════════
// TEXT SHAPING
// ═══════════════════════════════════════════════════════════════════════════

section("Text Shaping");

test("source lines are trimmed and CRLF becomes LF", () => {
  assert.equal(normalizeSourceText("  a  \r\n\tb"), "a\nb");
});

test("a leading byte order mark is dropped", () => {
  assert.equal(normalizeSourceText("\uFEFFHello"), "Hello");
});

test("blank-line runs collapse to one blank line", () => {
  assert.equal(finalizeDescription("\n\nA\n\n\n\nB  \n"), "A\n\nB\n");
});

test("blank output stays empty", () => {
  assert.equal(finalizeDescription(" \n\n "), "");
});

section("Define Options");

test("duplicates are reported once", () => {
  const { flags, duplicates } = parseDefineOptions(["nsfw", "a-b", "nsfw", "nsfw"]);
  assert.deepEqual([...flags], ["nsfw", "a-b"]);
  assert.deepEqual(duplicates, ["nsfw"]);
});

test("invalid characters are rejected", () => {
  assert.throws(
    () => parseDefineOptions(["ok", "bad flag", "x!"]),
    (err: unknown) =>
      err instanceof DefineOptionError &&
      err.message ===
        "Invalid define option(s): bad flag, x!. Options may only contain letters, digits, dashes and underscores." &&
      err.invalid.length === 2
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// GENERATION
// ═══════════════════════════════════════════════════════════════════════════

section("Generation");

const USERNAMES = { weasyl: "Tester", furaffinity: "Tester" };

test("one description per configured site, in registry order", () => {
  const descriptions = generateDescriptions("  Hello [b]there[/b]  \n\n\n\nBye  \n", {
    usernames: USERNAMES,
  });
  assert.deepEqual(descriptions, [
    {
      site: "furaffinity",
      fileName: "desc_furaffinity.txt",
      text: "Hello [b]there[/b]\n\nBye\n",
      gaps: [],
    },
    {
      site: "weasyl",
      fileName: "desc_weasyl.md",
      text: "Hello **there**\n\nBye\n",
      gaps: [],
    },
  ]);
});

test("blank source gives empty descriptions", () => {
  const descriptions = generateDescriptions("  \n ", { usernames: USERNAMES });
  assert.deepEqual(
    descriptions.map((d) => [d.site, d.text]),
    [
      ["furaffinity", ""],
      ["weasyl", ""],
    ]
  );
});

test("conditional lines leave no extra blank lines", () => {
  const descriptions = generateDescriptions("[if=site==fa]FA[/if]\n\nShared", {
    usernames: USERNAMES,
  });
  assert.equal(descriptions[0].text, "FA\n\nShared\n");
  assert.equal(descriptions[1].text, "Shared\n");
});

test("defined flags reach conditionals", () => {
  const [description] = generateDescriptions("[if=define==nsfw]Adult[/if][else]Safe[/else]", {
    usernames: { inkbunny: "Tester" },
    definedFlags: new Set(["nsfw"]),
  });
  assert.equal(description.text, "Adult\n");
});

test("a malformed source renders nothing", () => {
  assert.throws(
    () => generateDescriptions("fine\n[foo]", { usernames: USERNAMES }),
    (err: unknown) =>
      err instanceof DescriptionParseError && err.message === "Unknown tag [foo] (line 2, col 1)"
  );
});

test("gaps are logged as warnings for the site", () => {
  const entries: Array<{ entry: string; level: LogLevel }> = [];
  const logger = createLogger({
    console: false,
    write: (entry, level) => entries.push({ entry, level }),
  });

  const descriptions = generateDescriptions(
    "[siteurl][fa=https://fa.example/1][/fa][/siteurl]",
    { usernames: USERNAMES, logger }
  );

  assert.equal(descriptions[0].text, "[url]https://fa.example/1[/url]\n");
  assert.equal(descriptions[1].text, "");
  assert.equal(descriptions[1].gaps.length, 1);

  assert.equal(entries.length, 1);
  assert.equal(entries[0].level, "warn");
  assert.ok(
    entries[0].entry.endsWith(
      '[siteurl] has no entry for this site and no [generic]; rendered nothing {"site":"weasyl","line":1,"column":1}'
    ),
    entries[0].entry
  );
});

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
