// src/diagnostics/format.ts
//
// Caret rendering for lexer errors.
//
//   let s: String = "oops;
//                   ^
//
// Tabs are expanded to tab stops, the same stops the lexer uses when it
// advances its column counter, so the caret lands under the faulty character.

export const DEFAULT_TAB_SIZE = 4;

/** Next tab stop after a 0-based visual column. */
export function nextTabStop(visual: number, tabSize = DEFAULT_TAB_SIZE): number {
  return visual + (tabSize - (visual % tabSize));
}

export function expandTabs(line: string, tabSize = DEFAULT_TAB_SIZE): string {
  let out = "";
  for (const c of line) {
    if (c === "\t") out += " ".repeat(nextTabStop(out.length, tabSize) - out.length);
    else out += c;
  }
  return out;
}

/**
 * Number of columns before the caret for a 1-based `col`.
 * Walks the original line and stops before the target column.
 */
export function visualColumn(line: string, col: number, tabSize = DEFAULT_TAB_SIZE): number {
  const target = Math.max(0, col - 1);
  let visual = 0;

  for (const c of line) {
    if (visual >= target) break;
    visual = c === "\t" ? nextTabStop(visual, tabSize) : visual + 1;
  }

  // Faults past the end of the line (e.g. end of input) still point at `col`.
  return Math.max(visual, target);
}

export function renderCaret(sourceLine: string, col: number, tabSize = DEFAULT_TAB_SIZE): string {
  const display = expandTabs(sourceLine, tabSize);
  return `${display}\n${" ".repeat(visualColumn(sourceLine, col, tabSize))}^`;
}
