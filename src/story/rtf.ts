/**
 * RTF stylesheet helpers.
 *
 * Plain text converted to RTF comes out in a monospace "Preformatted Text"
 * paragraph style. Swapping that style's control words for those of the
 * "Normal" style turns the document into ordinary serif prose without
 * touching its content.
 */

export class RtfStyleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RtfStyleError";
  }
}

/**
 * Matches one stylesheet entry, e.g.
 *   {\s20\sbasedon0\snext20\ql\f5\fs20 Preformatted Text;}
 *
 * Groups:
 *   1: style number
 *   2: control words after \snextN
 *   3: style name
 */
const STYLE_RE = /\\s(\d+)(?:\\sbasedon\d+)?\\snext\d+((?:\\[a-z0-9]+ ?)+)(?: ([A-Z][a-zA-Z ]*));/g;

/**
 * Parse the stylesheet of an RTF document.
 *
 * Each style is reachable by number and by name; the value is the style's
 * defining control-word run (`\sN…` without the basedon/next links).
 *
 * @throws RtfStyleError if no style entries are found
 */
export function getRtfStyles(rtf: string): Map<string | number, string> {
  const styles = new Map<string | number, string>();
  STYLE_RE.lastIndex = 0;

  let match: RegExpExecArray | null;
  while ((match = STYLE_RE.exec(rtf)) !== null) {
    const [, number, controlWords, name] = match;
    const style = `\\s${number}${controlWords}`;
    styles.set(Number(number), style);
    styles.set(name, style);
  }

  if (styles.size === 0) {
    throw new RtfStyleError("Couldn't find valid RTF styles");
  }
  return styles;
}

/**
 * Replace every use of style `from` by style `to`.
 *
 * @throws RtfStyleError if either style is missing from the stylesheet
 */
export function replaceRtfStyle(rtf: string, from: string, to: string): string {
  const styles = getRtfStyles(rtf);
  const source = styles.get(from);
  const target = styles.get(to);
  if (source === undefined) {
    throw new RtfStyleError(`RTF style "${from}" not found`);
  }
  if (target === undefined) {
    throw new RtfStyleError(`RTF style "${to}" not found`);
  }
  return rtf.split(source).join(target);
}
