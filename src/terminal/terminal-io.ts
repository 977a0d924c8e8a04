import { StringDecoder } from 'node:string_decoder';
import {
  createKeyInputState,
  flushPendingKeyInput,
  reduceKeyInput,
  type SessionInputEvent,
} from '../session/key-input.ts';

const ENTER_ALTERNATE_SCREEN = '\u001b[?1049h';
const ENABLE_BRACKETED_PASTE = '\u001b[?2004h';
const CLEAR_SCREEN = '\u001b[2J';

const DISABLE_BRACKETED_PASTE = '\u001b[?2004l';
const LEAVE_ALTERNATE_SCREEN = '\u001b[?1049l';
const RESET_CURSOR_AND_STYLE = '\u001b[?25h\u001b[0m';

export const ENABLE_SESSION_TERMINAL_MODES =
  `${ENTER_ALTERNATE_SCREEN}${ENABLE_BRACKETED_PASTE}${CLEAR_SCREEN}`;
export const DISABLE_SESSION_TERMINAL_MODES =
  `${DISABLE_BRACKETED_PASTE}${LEAVE_ALTERNATE_SCREEN}${RESET_CURSOR_AND_STYLE}`;

interface TerminalModeManager {
  enable: () => void;
  restore: () => void;
  isEnabled: () => boolean;
}

export function createTerminalModeManager(write: (sequence: string) => void): TerminalModeManager {
  let enabled = false;

  return {
    enable: (): void => {
      if (enabled) {
        return;
      }
      write(ENABLE_SESSION_TERMINAL_MODES);
      enabled = true;
    },
    restore: (): void => {
      if (!enabled) {
        return;
      }
      write(DISABLE_SESSION_TERMINAL_MODES);
      enabled = false;
    },
    isEnabled: (): boolean => enabled,
  };
}

// How long a held Escape waits for the rest of a sequence before it counts as the Escape key.
export const ESCAPE_SEQUENCE_TIMEOUT_MS = 50;

function settleWithin<T>(pending: Promise<T>, timeoutMs: number): Promise<T | 'timeout'> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      resolve('timeout');
    }, timeoutMs);
    void pending.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

/**
 * Turns raw terminal chunks into session events, one chunk at a time. UTF-8 sequences split
 * between chunks are joined before decoding. Input held back at the end of a chunk is resolved
 * when the next chunk does not arrive within `escapeTimeoutMs`, or when input ends.
 */
export async function* readSessionInputEvents(
  input: AsyncIterable<Buffer | string>,
  escapeTimeoutMs = ESCAPE_SEQUENCE_TIMEOUT_MS,
): AsyncGenerator<SessionInputEvent> {
  const decoder = new StringDecoder('utf8');
  const iterator = input[Symbol.asyncIterator]();
  let keyInputState = createKeyInputState();
  let nextChunk: Promise<IteratorResult<Buffer | string>> | null = null;
  try {
    while (true) {
      nextChunk ??= iterator.next();
      const result =
        !keyInputState.inBracketedPaste && keyInputState.pendingSequence.length > 0
          ? await settleWithin(nextChunk, escapeTimeoutMs)
          : await nextChunk;
      if (result === 'timeout') {
        const flushed = flushPendingKeyInput(keyInputState);
        keyInputState = flushed.keyInputState;
        yield* flushed.events;
        continue;
      }
      nextChunk = null;
      if (result.done === true) {
        yield* flushPendingKeyInput(keyInputState).events;
        return;
      }
      const chunk = result.value;
      const text = typeof chunk === 'string' ? chunk : decoder.write(chunk);
      const reduced = reduceKeyInput(text, keyInputState);
      keyInputState = reduced.keyInputState;
      yield* reduced.events;
    }
  } finally {
    // A read still in flight cannot be cancelled; the stream's owner pauses it.
    if (nextChunk === null) {
      await iterator.return?.();
    }
  }
}

export function terminalSize(
  output: { columns?: number | undefined; rows?: number | undefined } = process.stdout,
): { cols: number; rows: number } {
  const cols = output.columns;
  const rows = output.rows;
  if (typeof cols === 'number' && cols > 0 && typeof rows === 'number' && rows > 0) {
    return { cols, rows };
  }
  return { cols: 80, rows: 24 };
}
