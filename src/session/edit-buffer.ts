export interface EditBuffer {
  readonly text: string;
  // Offset in code points.
  readonly cursor: number;
}

function codePoints(text: string): string[] {
  return Array.from(text);
}

function clampCursor(cursor: number, length: number): number {
  return Math.max(0, Math.min(length, cursor));
}

export function createEditBuffer(text = ''): EditBuffer {
  return {
    text,
    cursor: codePoints(text).length,
  };
}

export function editBufferPrefix(buffer: EditBuffer): string {
  return codePoints(buffer.text).slice(0, buffer.cursor).join('');
}

export function insertIntoEditBuffer(buffer: EditBuffer, inserted: string): EditBuffer {
  const chars = codePoints(buffer.text);
  const cursor = clampCursor(buffer.cursor, chars.length);
  const insertedChars = codePoints(inserted);
  chars.splice(cursor, 0, ...insertedChars);
  return {
    text: chars.join(''),
    cursor: cursor + insertedChars.length,
  };
}

export function deleteBackwardInEditBuffer(buffer: EditBuffer): EditBuffer {
  const chars = codePoints(buffer.text);
  const cursor = clampCursor(buffer.cursor, chars.length);
  if (cursor === 0) {
    return buffer;
  }
  chars.splice(cursor - 1, 1);
  return {
    text: chars.join(''),
    cursor: cursor - 1,
  };
}

export function deleteForwardInEditBuffer(buffer: EditBuffer): EditBuffer {
  const chars = codePoints(buffer.text);
  const cursor = clampCursor(buffer.cursor, chars.length);
  if (cursor === chars.length) {
    return buffer;
  }
  chars.splice(cursor, 1);
  return {
    text: chars.join(''),
    cursor,
  };
}

export function moveEditBufferCursor(
  buffer: EditBuffer,
  target: 'left' | 'right' | 'home' | 'end',
): EditBuffer {
  const length = codePoints(buffer.text).length;
  let cursor = clampCursor(buffer.cursor, length);
  if (target === 'left') {
    cursor = Math.max(0, cursor - 1);
  } else if (target === 'right') {
    cursor = Math.min(length, cursor + 1);
  } else if (target === 'home') {
    cursor = 0;
  } else {
    cursor = length;
  }
  if (cursor === buffer.cursor) {
    return buffer;
  }
  return {
    text: buffer.text,
    cursor,
  };
}
