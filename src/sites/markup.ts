/**
 * Formatting adapters.
 *
 * Each destination speaks one of three markup dialects. An adapter maps the
 * basic formatting kinds and links to that dialect; a kind missing from
 * `formats` means the site has no way to express it and the renderer emits
 * the content unwrapped.
 */

import type { FormatKind } from "./enums.js";

export interface SiteMarkup {
  /** Dialect name, for diagnostics. */
  readonly name: "bbcode" | "markdown" | "plaintext";
  readonly formats: Readonly<Partial<Record<FormatKind, (content: string) => string>>>;
  /** Link markup. A blank label means "show the URL itself". */
  link(url: string, label: string): string;
}

export const BBCODE: SiteMarkup = {
  name: "bbcode",
  formats: {
    bold: (content) => `[b]${content}[/b]`,
    italic: (content) => `[i]${content}[/i]`,
    underline: (content) => `[u]${content}[/u]`,
  },
  link: (url, label) =>
    label.trim() === "" ? `[url]${url}[/url]` : `[url=${url}]${label}[/url]`,
};

export const MARKDOWN: SiteMarkup = {
  name: "markdown",
  formats: {
    bold: (content) => `**${content}**`,
    italic: (content) => `*${content}*`,
    // Inline HTML is accepted by the Markdown flavours in use
    underline: (content) => `<u>${content}</u>`,
  },
  link: (url, label) => (label.trim() === "" ? `<${url}>` : `[${label}](${url})`),
};

export const PLAINTEXT: SiteMarkup = {
  name: "plaintext",
  formats: {},
  link: (url, label) => (label.trim() === "" ? url : `${label.trim()}: ${url}`),
};
