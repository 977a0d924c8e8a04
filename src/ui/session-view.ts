import { editBufferPrefix } from '../session/edit-buffer.ts';
import type { InteractiveSessionState } from '../session/session-state.ts';
import { drawUiBlock, innerUiRect, type UiRect } from './kit.ts';
import {
  createUiSurface,
  DEFAULT_UI_STYLE,
  drawUiText,
  fillUiRow,
  renderUiSurfaceAnsiRows,
  type UiStyle,
  type UiSurface,
} from './surface.ts';
import { resolveHorizontalWindow, skipDisplayColumns, truncateDisplayText } from './text-layout.ts';

export const SESSION_INPUT_TITLE = 'Base path:';
export const SESSION_HISTORY_TITLE = 'History';

const INPUT_BLOCK_ROWS = 3;
const STATUS_ROWS = 2;

const ERROR_STYLE: UiStyle = {
  ...DEFAULT_UI_STYLE,
  fg: { kind: 'indexed', index: 1 },
};

const DESIGNER_ON_STYLE: UiStyle = {
  ...DEFAULT_UI_STYLE,
  fg: { kind: 'indexed', index: 2 },
};

const HIGHLIGHT_STYLE: UiStyle = {
  ...DEFAULT_UI_STYLE,
  inverse: true,
};

interface SessionViewport {
  readonly cols: number;
  readonly rows: number;
}

interface SessionFrame {
  readonly surface: UiSurface;
  readonly cursor: { readonly col: number; readonly row: number };
}

export function formatDesignerIndicator(designerMode: boolean): string {
  return `Ctrl+D: Designer (${designerMode ? 'on' : 'off'})`;
}

// Keeps the highlighted row inside a list of `visibleRows`.
export function resolveHistoryScrollOffset(selected: number | null, visibleRows: number): number {
  if (selected === null || visibleRows <= 0) {
    return 0;
  }
  return Math.max(0, selected - visibleRows + 1);
}

function drawInputBlock(
  surface: UiSurface,
  rect: UiRect,
  state: InteractiveSessionState,
): { col: number; row: number } {
  const inner = innerUiRect(rect);
  const window = resolveHorizontalWindow(editBufferPrefix(state.input), inner.width);
  drawUiText(surface, inner.col, inner.row, skipDisplayColumns(state.input.text, window.scroll));
  // The frame is stroked last so it clips text running past the inner width.
  drawUiBlock(surface, rect, SESSION_INPUT_TITLE, DEFAULT_UI_STYLE);
  return {
    col: inner.col + window.cursorCol,
    row: inner.row,
  };
}

function drawStatusRows(surface: UiSurface, row: number, state: InteractiveSessionState): void {
  let nextRow = row;
  if (state.lastError !== null) {
    const message = truncateDisplayText(state.lastError, surface.cols);
    drawUiText(surface, 0, nextRow, message, ERROR_STYLE);
    nextRow += 1;
  }
  drawUiText(
    surface,
    0,
    nextRow,
    formatDesignerIndicator(state.designerMode),
    state.designerMode ? DESIGNER_ON_STYLE : DEFAULT_UI_STYLE,
  );
}

function drawHistoryBlock(surface: UiSurface, rect: UiRect, state: InteractiveSessionState): void {
  drawUiBlock(surface, rect, SESSION_HISTORY_TITLE, DEFAULT_UI_STYLE);
  const inner = innerUiRect(rect);
  const offset = resolveHistoryScrollOffset(state.selectedHistoryIndex, inner.height);
  const visible = state.history.slice(offset, offset + inner.height);
  visible.forEach((entry, position) => {
    const row = inner.row + position;
    const highlighted = offset + position === state.selectedHistoryIndex;
    const style = highlighted ? HIGHLIGHT_STYLE : DEFAULT_UI_STYLE;
    if (highlighted) {
      fillUiRow(surface, row, style, inner.col, inner.width);
    }
    drawUiText(surface, inner.col, row, truncateDisplayText(entry, inner.width), style);
  });
}

/**
 * Projects session state onto a surface: input block, status rows, then the history block
 * filling the remaining height.
 */
export function buildSessionFrame(
  state: InteractiveSessionState,
  viewport: SessionViewport,
): SessionFrame {
  const surface = createUiSurface(viewport.cols, viewport.rows);
  const cursor = drawInputBlock(
    surface,
    { col: 0, row: 0, width: surface.cols, height: INPUT_BLOCK_ROWS },
    state,
  );
  drawStatusRows(surface, INPUT_BLOCK_ROWS, state);
  const historyTop = INPUT_BLOCK_ROWS + STATUS_ROWS;
  drawHistoryBlock(
    surface,
    { col: 0, row: historyTop, width: surface.cols, height: surface.rows - historyTop },
    state,
  );
  return { surface, cursor };
}

export function renderSessionFrameAnsi(frame: SessionFrame): string {
  const rows = renderUiSurfaceAnsiRows(frame.surface);
  const cursorRow = Math.min(frame.surface.rows, frame.cursor.row + 1);
  const cursorCol = Math.min(frame.surface.cols, frame.cursor.col + 1);
  const moveCursor = `\u001b[${String(cursorRow)};${String(cursorCol)}H`;
  return `\u001b[H${rows.join('\r\n')}${moveCursor}\u001b[?25h`;
}
