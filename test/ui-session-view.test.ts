import assert from 'node:assert/strict';
import { test } from 'node:test';
import { createEditBuffer } from '../src/session/edit-buffer.ts';
import {
  createInteractiveSessionState,
  type InteractiveSessionState,
} from '../src/session/session-state.ts';
import {
  buildSessionFrame,
  formatDesignerIndicator,
  renderSessionFrameAnsi,
  resolveHistoryScrollOffset,
} from '../src/ui/session-view.ts';
import { readUiSurfaceRow, readUiSurfaceStyle } from '../src/ui/surface.ts';

const VIEWPORT = { cols: 24, rows: 9 };

function sessionState(overrides: Partial<InteractiveSessionState> = {}): InteractiveSessionState {
  return {
    ...createInteractiveSessionState(['alpha;one', 'beta;two']),
    input: createEditBuffer('h;r'),
    ...overrides,
  };
}

function rows(state: InteractiveSessionState): string[] {
  const { surface } = buildSessionFrame(state, VIEWPORT);
  return Array.from({ length: surface.rows }, (_, row) => readUiSurfaceRow(surface, row));
}

void test('designer indicator text', () => {
  assert.equal(formatDesignerIndicator(false), 'Ctrl+D: Designer (off)');
  assert.equal(formatDesignerIndicator(true), 'Ctrl+D: Designer (on)');
});

void test('history scroll offset keeps the highlight in view', () => {
  assert.equal(resolveHistoryScrollOffset(null, 3), 0);
  assert.equal(resolveHistoryScrollOffset(1, 3), 0);
  assert.equal(resolveHistoryScrollOffset(5, 3), 3);
});

void test('frame lays out input, status and history blocks', () => {
  assert.deepEqual(rows(sessionState()), [
    `┌Base path:${'─'.repeat(12)}┐`,
    `│h;r${' '.repeat(19)}│`,
    `└${'─'.repeat(22)}┘`,
    `Ctrl+D: Designer (off)  `,
    ' '.repeat(24),
    `┌History${'─'.repeat(15)}┐`,
    `│alpha;one${' '.repeat(13)}│`,
    `│beta;two${' '.repeat(14)}│`,
    `└${'─'.repeat(22)}┘`,
  ]);
  assert.deepEqual(buildSessionFrame(sessionState(), VIEWPORT).cursor, { col: 4, row: 1 });
});

void test('error line is red above a green designer indicator', () => {
  const { surface } = buildSessionFrame(
    sessionState({ lastError: 'Parsing error: x', designerMode: true }),
    VIEWPORT,
  );
  assert.equal(readUiSurfaceRow(surface, 3), `Parsing error: x${' '.repeat(8)}`);
  assert.equal(readUiSurfaceRow(surface, 4), `Ctrl+D: Designer (on)${' '.repeat(3)}`);
  assert.deepEqual(readUiSurfaceStyle(surface, 0, 3)?.fg, { kind: 'indexed', index: 1 });
  assert.deepEqual(readUiSurfaceStyle(surface, 0, 4)?.fg, { kind: 'indexed', index: 2 });
});

void test('highlighted history row is drawn inverse across the panel', () => {
  const { surface } = buildSessionFrame(sessionState({ selectedHistoryIndex: 1 }), VIEWPORT);
  assert.equal(readUiSurfaceStyle(surface, 1, 6)?.inverse, false);
  assert.equal(readUiSurfaceStyle(surface, 1, 7)?.inverse, true);
  assert.equal(readUiSurfaceStyle(surface, 22, 7)?.inverse, true);
  assert.equal(readUiSurfaceStyle(surface, 23, 7)?.inverse, false);
});

void test('history list scrolls to the highlight', () => {
  const state = sessionState({
    history: ['one;1', 'two;2', 'three;3'],
    selectedHistoryIndex: 2,
  });
  const frameRows = rows(state);
  assert.equal(frameRows[6], `│two;2${' '.repeat(17)}│`);
  assert.equal(frameRows[7], `│three;3${' '.repeat(15)}│`);
});

void test('long input scrolls horizontally to keep the cursor visible', () => {
  const state = sessionState({ input: createEditBuffer('abcdefghijklmnopqrstuvwxyz') });
  const frame = buildSessionFrame(state, VIEWPORT);
  assert.equal(readUiSurfaceRow(frame.surface, 1), '│fghijklmnopqrstuvwxyz │');
  assert.deepEqual(frame.cursor, { col: 22, row: 1 });
});

void test('ansi output homes, draws rows and places the cursor', () => {
  const output = renderSessionFrameAnsi(buildSessionFrame(sessionState(), VIEWPORT));
  assert.equal(output.startsWith('\u001b[H'), true);
  assert.equal(output.endsWith('\u001b[2;5H\u001b[?25h'), true);
  assert.equal(output.split('\r\n').length, 9);
});
