export type SessionInputEvent =
  | { readonly type: 'insert'; readonly text: string }
  | { readonly type: 'backspace' }
  | { readonly type: 'delete' }
  | { readonly type: 'cursor-left' }
  | { readonly type: 'cursor-right' }
  | { readonly type: 'cursor-home' }
  | { readonly type: 'cursor-end' }
  | { readonly type: 'history-up' }
  | { readonly type: 'history-down' }
  | { readonly type: 'confirm' }
  | { readonly type: 'toggle-designer' }
  | { readonly type: 'cancel' };

export interface KeyInputState {
  readonly inBracketedPaste: boolean;
  readonly pendingSequence: string;
}

interface KeyInputReduction {
  readonly events: readonly SessionInputEvent[];
  readonly keyInputState: KeyInputState;
}

const ESC = '\u001b';
const BRACKETED_PASTE_START = `${ESC}[200~`;
const BRACKETED_PASTE_END = `${ESC}[201~`;

const CSI_FINAL_EVENTS: Readonly<Record<string, SessionInputEvent>> = {
  A: { type: 'history-up' },
  B: { type: 'history-down' },
  C: { type: 'cursor-right' },
  D: { type: 'cursor-left' },
  H: { type: 'cursor-home' },
  F: { type: 'cursor-end' },
};

const CSI_TILDE_EVENTS: Readonly<Record<string, SessionInputEvent>> = {
  '1': { type: 'cursor-home' },
  '7': { type: 'cursor-home' },
  '3': { type: 'delete' },
  '4': { type: 'cursor-end' },
  '8': { type: 'cursor-end' },
};

const CONTROL_EVENTS: Readonly<Record<string, SessionInputEvent>> = {
  '\r': { type: 'confirm' },
  '\n': { type: 'confirm' },
  '\u007f': { type: 'backspace' },
  '\b': { type: 'backspace' },
  '\u0003': { type: 'cancel' },
  '\u0004': { type: 'toggle-designer' },
  '\u0001': { type: 'cursor-home' },
  '\u0005': { type: 'cursor-end' },
};

export function createKeyInputState(): KeyInputState {
  return {
    inBracketedPaste: false,
    pendingSequence: '',
  };
}

function isPrintable(char: string): boolean {
  const codePoint = char.codePointAt(0) ?? 0;
  return codePoint >= 0x20 && codePoint !== 0x7f && !(codePoint >= 0x80 && codePoint < 0xa0);
}

interface EscapeSequenceScan {
  readonly length: number;
  readonly event: SessionInputEvent | null;
  readonly truncated: boolean;
}

function scanEscapeSequence(text: string, index: number): EscapeSequenceScan {
  const introducer = text[index + 1];
  if (introducer === undefined) {
    // Either a bare Escape or the head of a sequence still in flight.
    return { length: 1, event: null, truncated: true };
  }
  if (introducer !== '[' && introducer !== 'O') {
    const altKey = String.fromCodePoint(text.codePointAt(index + 1) ?? 0);
    if (isPrintable(altKey)) {
      // Alt+key: not bound, and the key itself is not inserted.
      return { length: 1 + altKey.length, event: null, truncated: false };
    }
    return { length: 1, event: { type: 'cancel' }, truncated: false };
  }
  let cursor = index + 2;
  let params = '';
  while (cursor < text.length) {
    const char = text[cursor] ?? '';
    const code = char.charCodeAt(0);
    if (code >= 0x30 && code <= 0x3f) {
      params += char;
      cursor += 1;
      continue;
    }
    if (code >= 0x40 && code <= 0x7e) {
      const length = cursor - index + 1;
      if (char === '~') {
        const key = params.split(';')[0] ?? '';
        return { length, event: CSI_TILDE_EVENTS[key] ?? null, truncated: false };
      }
      return { length, event: CSI_FINAL_EVENTS[char] ?? null, truncated: false };
    }
    // Not a well-formed sequence; drop the introducer and keep scanning.
    return { length: 2, event: null, truncated: false };
  }
  return { length: text.length - index, event: null, truncated: true };
}

function pushInsert(events: SessionInputEvent[], char: string): void {
  const last = events[events.length - 1];
  if (last !== undefined && last.type === 'insert') {
    events[events.length - 1] = { type: 'insert', text: `${last.text}${char}` };
    return;
  }
  events.push({ type: 'insert', text: char });
}

/**
 * Resolves input held back at the end of a chunk once no more input follows it. A held lone
 * Escape is the Escape key; a partial sequence is dropped.
 */
export function flushPendingKeyInput(state: KeyInputState): KeyInputReduction {
  const events: SessionInputEvent[] =
    !state.inBracketedPaste && state.pendingSequence === ESC ? [{ type: 'cancel' }] : [];
  return {
    events,
    keyInputState: {
      inBracketedPaste: state.inBracketedPaste,
      pendingSequence: '',
    },
  };
}

/**
 * Decodes one chunk of raw terminal input into session events. Escape sequences and paste
 * markers split across chunks are carried in the returned state.
 */
export function reduceKeyInput(chunk: string, state: KeyInputState): KeyInputReduction {
  const text = `${state.pendingSequence}${chunk}`;
  const events: SessionInputEvent[] = [];
  let inBracketedPaste = state.inBracketedPaste;
  let pendingSequence = '';

  let index = 0;
  while (index < text.length) {
    if (text.startsWith(BRACKETED_PASTE_START, index)) {
      inBracketedPaste = true;
      index += BRACKETED_PASTE_START.length;
      continue;
    }
    if (text.startsWith(BRACKETED_PASTE_END, index)) {
      inBracketedPaste = false;
      index += BRACKETED_PASTE_END.length;
      continue;
    }

    const codePoint = text.codePointAt(index) ?? 0;
    const char = String.fromCodePoint(codePoint);
    if (inBracketedPaste) {
      if (char === ESC && BRACKETED_PASTE_END.startsWith(text.slice(index))) {
        pendingSequence = text.slice(index);
        break;
      }
      if (isPrintable(char)) {
        pushInsert(events, char);
      }
      index += char.length;
      continue;
    }

    if (char === ESC) {
      const scan = scanEscapeSequence(text, index);
      if (scan.truncated) {
        pendingSequence = text.slice(index);
        break;
      }
      if (scan.event !== null) {
        events.push(scan.event);
      }
      index += scan.length;
      continue;
    }

    const control = CONTROL_EVENTS[char];
    if (control !== undefined) {
      events.push(control);
      index += char === '\r' && text[index + 1] === '\n' ? 2 : 1;
      continue;
    }
    if (isPrintable(char)) {
      pushInsert(events, char);
    }
    index += char.length;
  }

  return {
    events,
    keyInputState: {
      inBracketedPaste,
      pendingSequence,
    },
  };
}
