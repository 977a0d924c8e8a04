import {
  createEditBuffer,
  deleteBackwardInEditBuffer,
  deleteForwardInEditBuffer,
  insertIntoEditBuffer,
  moveEditBufferCursor,
  type EditBuffer,
} from './edit-buffer.ts';
import type { SessionInputEvent } from './key-input.ts';

export type SessionExitReason = 'launched' | 'cancelled';

export type SessionPhase = 'editing' | 'selecting' | 'exited';

export interface InteractiveSessionState {
  readonly input: EditBuffer;
  readonly selectedHistoryIndex: number | null;
  readonly designerMode: boolean;
  readonly lastError: string | null;
  readonly history: readonly string[];
  readonly exitReason: SessionExitReason | null;
}

export type SessionEffect =
  | { readonly type: 'none' }
  | { readonly type: 'launch'; readonly text: string; readonly designerMode: boolean };

interface SessionReduction {
  readonly state: InteractiveSessionState;
  readonly effect: SessionEffect;
}

const NO_EFFECT: SessionEffect = { type: 'none' };

export function createInteractiveSessionState(
  history: readonly string[],
  designerMode = false,
): InteractiveSessionState {
  return {
    input: createEditBuffer(),
    selectedHistoryIndex: null,
    designerMode,
    lastError: null,
    history,
    exitReason: null,
  };
}

export function resolveSessionPhase(state: InteractiveSessionState): SessionPhase {
  if (state.exitReason !== null) {
    return 'exited';
  }
  return state.selectedHistoryIndex === null ? 'editing' : 'selecting';
}

// Any edit-buffer key drops the history highlight before it applies.
function edit(
  state: InteractiveSessionState,
  update: (input: EditBuffer) => EditBuffer,
): SessionReduction {
  return {
    state: {
      ...state,
      input: update(state.input),
      selectedHistoryIndex: null,
    },
    effect: NO_EFFECT,
  };
}

function moveHighlight(
  state: InteractiveSessionState,
  direction: 'up' | 'down',
): InteractiveSessionState {
  const lastIndex = state.history.length - 1;
  if (lastIndex < 0) {
    return state;
  }
  const current = state.selectedHistoryIndex;
  let next: number;
  if (current === null) {
    next = 0;
  } else if (direction === 'up') {
    next = Math.max(0, current - 1);
  } else {
    next = Math.min(lastIndex, current + 1);
  }
  if (next === current) {
    return state;
  }
  return {
    ...state,
    selectedHistoryIndex: next,
  };
}

function confirm(state: InteractiveSessionState): SessionReduction {
  if (state.selectedHistoryIndex !== null) {
    const recalled = state.history[state.selectedHistoryIndex];
    return {
      state: {
        ...state,
        input: recalled === undefined ? state.input : createEditBuffer(recalled),
        selectedHistoryIndex: null,
      },
      effect: NO_EFFECT,
    };
  }
  if (state.input.text.length === 0) {
    return { state, effect: NO_EFFECT };
  }
  return {
    state,
    effect: {
      type: 'launch',
      text: state.input.text,
      designerMode: state.designerMode,
    },
  };
}

export function reduceSessionEvent(
  state: InteractiveSessionState,
  event: SessionInputEvent,
): SessionReduction {
  if (state.exitReason !== null) {
    return { state, effect: NO_EFFECT };
  }
  switch (event.type) {
    case 'insert': {
      const inserted = event.text;
      return edit(state, (input) => insertIntoEditBuffer(input, inserted));
    }
    case 'backspace':
      return edit(state, deleteBackwardInEditBuffer);
    case 'delete':
      return edit(state, deleteForwardInEditBuffer);
    case 'cursor-left':
      return edit(state, (input) => moveEditBufferCursor(input, 'left'));
    case 'cursor-right':
      return edit(state, (input) => moveEditBufferCursor(input, 'right'));
    case 'cursor-home':
      return edit(state, (input) => moveEditBufferCursor(input, 'home'));
    case 'cursor-end':
      return edit(state, (input) => moveEditBufferCursor(input, 'end'));
    case 'history-up':
      return { state: moveHighlight(state, 'up'), effect: NO_EFFECT };
    case 'history-down':
      return { state: moveHighlight(state, 'down'), effect: NO_EFFECT };
    case 'confirm':
      return confirm(state);
    case 'toggle-designer':
      return { state: { ...state, designerMode: !state.designerMode }, effect: NO_EFFECT };
    case 'cancel':
      return { state: { ...state, exitReason: 'cancelled' }, effect: NO_EFFECT };
  }
}

export function applyLaunchFailure(
  state: InteractiveSessionState,
  message: string,
): InteractiveSessionState {
  return {
    ...state,
    lastError: message,
  };
}

export function applyLaunchSuccess(
  state: InteractiveSessionState,
  history: readonly string[],
): InteractiveSessionState {
  return {
    ...state,
    history,
    exitReason: 'launched',
  };
}
