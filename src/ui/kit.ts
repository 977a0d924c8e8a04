import { drawUiText, type UiStyle, type UiSurface } from './surface.ts';
import { truncateDisplayText } from './text-layout.ts';

export interface UiRect {
  readonly col: number;
  readonly row: number;
  readonly width: number;
  readonly height: number;
}

const BOX_TOP_LEFT = '┌';
const BOX_TOP_RIGHT = '┐';
const BOX_BOTTOM_LEFT = '└';
const BOX_BOTTOM_RIGHT = '┘';
const BOX_HORIZONTAL = '─';
const BOX_VERTICAL = '│';

export function innerUiRect(rect: UiRect): UiRect {
  return {
    col: rect.col + 1,
    row: rect.row + 1,
    width: Math.max(0, rect.width - 2),
    height: Math.max(0, rect.height - 2),
  };
}

/**
 * Single-line bordered block, clipped to the surface, with its title set into the top edge one
 * column in from the corner. Blocks narrower or shorter than two cells are not drawn.
 */
export function drawUiBlock(
  surface: UiSurface,
  rect: UiRect,
  title: string,
  style: UiStyle,
): void {
  const left = Math.max(0, rect.col);
  const top = Math.max(0, rect.row);
  const right = Math.min(surface.cols, rect.col + rect.width) - 1;
  const bottom = Math.min(surface.rows, rect.row + rect.height) - 1;
  if (right <= left || bottom <= top) {
    return;
  }

  const span = right - left - 1;
  const edge = BOX_HORIZONTAL.repeat(span);
  drawUiText(surface, left, top, `${BOX_TOP_LEFT}${edge}${BOX_TOP_RIGHT}`, style);
  drawUiText(surface, left, bottom, `${BOX_BOTTOM_LEFT}${edge}${BOX_BOTTOM_RIGHT}`, style);
  for (let row = top + 1; row < bottom; row += 1) {
    drawUiText(surface, left, row, BOX_VERTICAL, style);
    drawUiText(surface, right, row, BOX_VERTICAL, style);
  }
  drawUiText(surface, left + 1, top, truncateDisplayText(title, span), style);
}
