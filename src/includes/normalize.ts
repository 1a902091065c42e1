const EMPTY_COMMENT_LINE = /^(\/\/!?)[ \t]+$/;

/** "//!   " → "//!", "//  " → "//"; anything else is returned as is. */
export function normalizeCommentLine(line: string): string {
  return line.replace(EMPTY_COMMENT_LINE, "$1");
}

export function normalizeLines(lines: string[]): string[] {
  return lines.map(normalizeCommentLine);
}
