/**
 * Built-in destination sites.
 *
 * Each descriptor carries the site's aliases, the markup dialect it accepts,
 * the description file it gets, how a username becomes a profile URL, and
 * any native shorthand the site has for mentioning users (its own or other
 * sites'). Adding a site means adding an entry here; nothing in the parser
 * or resolver needs to change.
 */

import type { SiteId } from "./enums.js";
import { BBCODE, MARKDOWN, PLAINTEXT, type SiteMarkup } from "./markup.js";

export interface SiteDescriptor {
  readonly id: SiteId;
  /** Human-readable site name, e.g. "Fur Affinity". */
  readonly name: string;
  /** Lowercase tag / config aliases, including the id itself. */
  readonly aliases: ReadonlySet<string>;
  readonly markup: SiteMarkup;
  /** File name of the generated description. */
  readonly outputFile: string;
  profileUrl(username: string): string;
  /**
   * Native mention of `username` from site `owner`, used when the visible
   * text would just be the username. Returns undefined when the site has no
   * shorthand for that owner, in which case a profile link is emitted.
   */
  mention?(owner: SiteDescriptor, username: string): string | undefined;
  /** Validates a username for this site; returns a reason when invalid. */
  checkUsername?(username: string): string | undefined;
}

// ---------------------------------------------------------------------------
// Username helpers
// ---------------------------------------------------------------------------

export interface MastodonHandle {
  user: string;
  instance: string;
}

/**
 * Split `user@instance` (optionally `@user@instance`) into its parts.
 */
export function parseMastodonHandle(handle: string): MastodonHandle | null {
  const match = /^@?([^@\s]+)@([^@\s]+\.[^@\s]+)$/.exec(handle.trim());
  if (!match) {
    return null;
  }
  return { user: match[1], instance: match[2] };
}

function twitterHandle(username: string): string {
  const parts = username.split("@");
  return parts[parts.length - 1];
}

function weasylLogin(username: string): string {
  return username.replace(/ /g, "").toLowerCase();
}

/**
 * Plain-text mention used by sites without links or icons:
 * "Name on Fur Affinity", "@handle on Twitter", "@user on instance".
 */
function plaintextMention(owner: SiteDescriptor, username: string): string {
  if (owner.id === "twitter") {
    return `@${twitterHandle(username)} on Twitter`;
  }
  if (owner.id === "mastodon") {
    const handle = parseMastodonHandle(username);
    if (handle) {
      return `@${handle.user} on ${handle.instance}`;
    }
  }
  return `${username} on ${owner.name}`;
}

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

const aryion: SiteDescriptor = {
  id: "aryion",
  name: "Eka's Portal",
  aliases: new Set(["aryion", "eka", "eka_portal"]),
  markup: BBCODE,
  outputFile: "desc_aryion.txt",
  profileUrl: (username) => `https://aryion.com/g4/user/${username}`,
  mention: (owner, username) =>
    owner.id === "aryion" ? `:icon${username}:` : undefined,
};

const furaffinity: SiteDescriptor = {
  id: "furaffinity",
  name: "Fur Affinity",
  aliases: new Set(["furaffinity", "fa"]),
  markup: BBCODE,
  outputFile: "desc_furaffinity.txt",
  profileUrl: (username) =>
    `https://furaffinity.net/user/${username.replace(/_/g, "")}`,
  mention: (owner, username) =>
    owner.id === "furaffinity" ? `:icon${username}:` : undefined,
};

const weasyl: SiteDescriptor = {
  id: "weasyl",
  name: "Weasyl",
  aliases: new Set(["weasyl"]),
  markup: MARKDOWN,
  outputFile: "desc_weasyl.md",
  profileUrl: (username) => `https://www.weasyl.com/~${weasylLogin(username)}`,
  mention: (owner, username) => {
    switch (owner.id) {
      case "weasyl":
        return `<!~${username.replace(/ /g, "")}>`;
      case "furaffinity":
        return `<fa:${username}>`;
      case "inkbunny":
        return `<ib:${username}>`;
      case "sofurry":
        return `<sf:${username}>`;
      default:
        return undefined;
    }
  },
};

const inkbunny: SiteDescriptor = {
  id: "inkbunny",
  name: "Inkbunny",
  aliases: new Set(["inkbunny", "ib"]),
  markup: BBCODE,
  outputFile: "desc_inkbunny.txt",
  profileUrl: (username) => `https://inkbunny.net/${username}`,
  mention: (owner, username) => {
    switch (owner.id) {
      case "inkbunny":
        return `[iconname]${username}[/iconname]`;
      case "furaffinity":
        return `[fa]${username}[/fa]`;
      case "sofurry":
        return `[sf]${username}[/sf]`;
      case "weasyl":
        return `[weasyl]${weasylLogin(username)}[/weasyl]`;
      default:
        return undefined;
    }
  },
};

const sofurry: SiteDescriptor = {
  id: "sofurry",
  name: "SoFurry",
  aliases: new Set(["sofurry", "sf"]),
  markup: BBCODE,
  outputFile: "desc_sofurry.txt",
  profileUrl: (username) =>
    `https://${username.replace(/ /g, "-").toLowerCase()}.sofurry.com`,
  mention: (owner, username) => {
    switch (owner.id) {
      case "sofurry":
        return `:icon${username}:`;
      case "furaffinity":
        return `fa!${username}`;
      case "inkbunny":
        return `ib!${username}`;
      default:
        return undefined;
    }
  },
};

const twitter: SiteDescriptor = {
  id: "twitter",
  name: "Twitter",
  aliases: new Set(["twitter"]),
  markup: PLAINTEXT,
  outputFile: "desc_twitter.txt",
  profileUrl: (username) => `https://twitter.com/${twitterHandle(username)}`,
  mention: (owner, username) =>
    owner.id === "twitter"
      ? `@${twitterHandle(username)}`
      : plaintextMention(owner, username),
};

const mastodon: SiteDescriptor = {
  id: "mastodon",
  name: "Mastodon",
  aliases: new Set(["mastodon"]),
  markup: PLAINTEXT,
  outputFile: "desc_mastodon.txt",
  profileUrl: (username) => {
    const handle = parseMastodonHandle(username);
    // checkUsername rejects malformed handles before anything is rendered
    return handle ? `https://${handle.instance}/@${handle.user}` : username;
  },
  mention: (owner, username) => {
    if (owner.id === "mastodon") {
      const handle = parseMastodonHandle(username);
      return handle ? `@${handle.user}@${handle.instance}` : undefined;
    }
    return plaintextMention(owner, username);
  },
  checkUsername: (username) =>
    parseMastodonHandle(username)
      ? undefined
      : `Mastodon username "${username}" must look like user@instance`,
};

/** Built-in sites in their canonical order. */
export const BUILTIN_SITES: readonly SiteDescriptor[] = [
  aryion,
  furaffinity,
  weasyl,
  inkbunny,
  sofurry,
  twitter,
  mastodon,
];
