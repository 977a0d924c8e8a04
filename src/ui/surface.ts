import { measureDisplayWidth } from './text-layout.ts';

export type UiColor = { kind: 'default' } | { kind: 'indexed'; index: number };

export interface UiStyle {
  readonly fg: UiColor;
  readonly bg: UiColor;
  readonly bold: boolean;
  readonly inverse: boolean;
}

export const DEFAULT_UI_STYLE: UiStyle = {
  fg: { kind: 'default' },
  bg: { kind: 'default' },
  bold: false,
  inverse: false,
};

// The right half of a wide glyph is a cell whose glyph is ''.
interface UiCell {
  glyph: string;
  style: UiStyle;
}

export interface UiSurface {
  readonly cols: number;
  readonly rows: number;
  readonly grid: UiCell[][];
}

const BLANK_GLYPH = ' ';

function colorParams(color: UiColor, base: 30 | 40): string {
  if (color.kind === 'default') {
    return String(base + 9);
  }
  return `${String(base + 8)};5;${String(color.index)}`;
}

function sgrForStyle(style: UiStyle): string {
  const params = ['0'];
  if (style.bold) {
    params.push('1');
  }
  if (style.inverse) {
    params.push('7');
  }
  params.push(colorParams(style.fg, 30), colorParams(style.bg, 40));
  return `\u001b[${params.join(';')}m`;
}

function rowCells(surface: UiSurface, row: number): UiCell[] | null {
  return surface.grid[row] ?? null;
}

export function createUiSurface(cols: number, rows: number): UiSurface {
  const width = Math.max(1, cols);
  const height = Math.max(1, rows);
  return {
    cols: width,
    rows: height,
    grid: Array.from({ length: height }, () =>
      Array.from({ length: width }, () => ({ glyph: BLANK_GLYPH, style: DEFAULT_UI_STYLE })),
    ),
  };
}

export function fillUiRow(
  surface: UiSurface,
  row: number,
  style: UiStyle,
  colStart: number,
  width: number,
): void {
  const cells = rowCells(surface, row);
  if (cells === null) {
    return;
  }
  for (const cell of cells.slice(Math.max(0, colStart), colStart + width)) {
    cell.glyph = BLANK_GLYPH;
    cell.style = style;
  }
}

/**
 * Writes `text` from `colStart` on one row. A glyph that would cross the right edge stops the
 * write; combining marks join the glyph before them.
 */
export function drawUiText(
  surface: UiSurface,
  colStart: number,
  row: number,
  text: string,
  style: UiStyle = DEFAULT_UI_STYLE,
): void {
  const cells = rowCells(surface, row);
  if (cells === null) {
    return;
  }
  let col = Math.max(0, colStart);
  let previous: UiCell | null = null;
  for (const glyph of text) {
    const span = measureDisplayWidth(glyph);
    if (span === 0) {
      if (previous !== null) {
        previous.glyph += glyph;
      }
      continue;
    }
    const head = cells[col];
    if (head === undefined || col + span > surface.cols) {
      return;
    }
    head.glyph = glyph;
    head.style = style;
    for (const tail of cells.slice(col + 1, col + span)) {
      tail.glyph = '';
      tail.style = style;
    }
    previous = head;
    col += span;
  }
}

export function readUiSurfaceRow(surface: UiSurface, row: number): string {
  return (rowCells(surface, row) ?? []).map((cell) => cell.glyph).join('');
}

export function readUiSurfaceStyle(surface: UiSurface, col: number, row: number): UiStyle | null {
  return rowCells(surface, row)?.[col]?.style ?? null;
}

export function renderUiSurfaceAnsiRows(surface: UiSurface): readonly string[] {
  return surface.grid.map((cells) => {
    let activeSgr = '';
    let line = '';
    for (const cell of cells) {
      const sgr = sgrForStyle(cell.style);
      if (sgr !== activeSgr) {
        line += sgr;
        activeSgr = sgr;
      }
      line += cell.glyph;
    }
    return `${line}\u001b[0m`;
  });
}
