/**
 * Hyperlink cells carry a label and a link in one formula:
 *   =HYPERLINK("<link>", "<text>")
 * with literal double quotes in the text escaped as \"
 */

const HYPERLINK_RE = /^=HYPERLINK\("(.+)", "(.+)"\)$/;

export interface HyperlinkParts {
  link: string;
  text: string;
}

/**
 * Encode a label and an optional link as a cell value
 * @param text - The display text
 * @param link - The link; when absent the text is returned unchanged
 */
export function encodeHyperlink(text: string, link?: string): string {
  if (link === undefined) {
    return text;
  }
  const escaped = text.replace(/"/g, '\\"');
  return `=HYPERLINK("${link}", "${escaped}")`;
}

/**
 * Extract the link and text from a hyperlink formula
 * @returns The parts, or undefined if the value is not a hyperlink formula
 */
export function decodeHyperlink(formula: string): HyperlinkParts | undefined {
  const match = HYPERLINK_RE.exec(formula);
  if (!match) {
    return undefined;
  }
  return {
    link: match[1],
    text: match[2].replace(/\\"/g, '"'),
  };
}
