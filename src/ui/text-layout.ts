// East Asian wide and fullwidth blocks, plus the pictographic emoji planes.
const WIDE_CODE_POINT_RANGES: ReadonlyArray<readonly [first: number, last: number]> = [
  [0x1100, 0x115f],
  [0x2329, 0x232a],
  [0x2e80, 0xa4cf],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe10, 0xfe19],
  [0xfe30, 0xfe6f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f300, 0x1faff],
];

const COMBINING_MARK_PATTERN = /^\p{Mark}$/u;

function isControlCodePoint(codePoint: number): boolean {
  return codePoint < 0x20 || (codePoint >= 0x7f && codePoint < 0xa0);
}

// Columns taken by one code point: 0 for controls and combining marks.
function glyphColumns(glyph: string): number {
  const codePoint = glyph.codePointAt(0) ?? 0;
  if (isControlCodePoint(codePoint) || COMBINING_MARK_PATTERN.test(glyph)) {
    return 0;
  }
  const wide = WIDE_CODE_POINT_RANGES.some(
    ([first, last]) => codePoint >= first && codePoint <= last,
  );
  return wide ? 2 : 1;
}

export function measureDisplayWidth(text: string): number {
  let columns = 0;
  for (const glyph of text) {
    columns += glyphColumns(glyph);
  }
  return columns;
}

// Zero-width glyphs still count as one column when cutting.
function truncationColumns(glyph: string): number {
  return Math.max(1, glyphColumns(glyph));
}

/**
 * Fits `text` into `width` columns. Text that does not fit keeps its longest prefix that
 * leaves room for a trailing `…`.
 */
export function truncateDisplayText(text: string, width: number): string {
  const limit = Math.max(0, Math.floor(width));
  if (limit === 0) {
    return '';
  }
  const glyphs = Array.from(text);
  const total = glyphs.reduce((sum, glyph) => sum + truncationColumns(glyph), 0);
  if (total <= limit) {
    return text;
  }
  let kept = '';
  let used = 0;
  for (const glyph of glyphs) {
    used += truncationColumns(glyph);
    if (used > limit - 1) {
      break;
    }
    kept += glyph;
  }
  return `${kept}…`;
}

export interface HorizontalWindow {
  // Display columns skipped on the left.
  readonly scroll: number;
  // Cursor column relative to the visible window.
  readonly cursorCol: number;
}

/**
 * Scrolls a single-line field so the cursor cell stays inside `width` columns.
 */
export function resolveHorizontalWindow(
  textBeforeCursor: string,
  width: number,
): HorizontalWindow {
  const safeWidth = Math.max(1, Math.floor(width));
  const cursorColumn = measureDisplayWidth(textBeforeCursor);
  const scroll = Math.max(0, cursorColumn - safeWidth + 1);
  return {
    scroll,
    cursorCol: cursorColumn - scroll,
  };
}

/**
 * Drops whole glyphs until `columns` display columns are skipped.
 */
export function skipDisplayColumns(text: string, columns: number): string {
  if (columns <= 0) {
    return text;
  }
  let skipped = 0;
  let offset = 0;
  for (const glyph of text) {
    if (skipped >= columns) {
      break;
    }
    skipped += glyphColumns(glyph);
    offset += glyph.length;
  }
  return text.slice(offset);
}
