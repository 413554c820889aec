/**
 * Kinsoku shori tables.
 * Characters that must not open a column (closing punctuation and brackets)
 * and characters that must not close one (opening brackets and quotes).
 */

/**
 * Must not appear at the head of a column.
 */
export const LINE_HEAD_PROHIBITED: ReadonlySet<string> = new Set(
  Array.from('、。，．！？)]｝〕〉》」』】')
);

/**
 * Must not appear at the end of a column.
 */
export const LINE_END_PROHIBITED: ReadonlySet<string> = new Set(
  Array.from('([｛〔〈《「『【')
);

export function isLineHeadProhibited(text: string): boolean {
  return LINE_HEAD_PROHIBITED.has(text);
}

export function isLineEndProhibited(text: string): boolean {
  return LINE_END_PROHIBITED.has(text);
}
