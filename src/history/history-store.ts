import { randomUUID } from 'node:crypto';
import { mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

export const DEFAULT_HISTORY_FILE_NAME = 'baserun_history.txt';

export function parseHistoryText(text: string): string[] {
  const entries: string[] = [];
  const seen = new Set<string>();
  for (const line of text.split('\n')) {
    const entry = line.trim();
    if (entry.length === 0 || seen.has(entry)) {
      continue;
    }
    seen.add(entry);
    entries.push(entry);
  }
  return entries;
}

export function serializeHistory(history: readonly string[]): string {
  return history.map((entry) => `${entry}\n`).join('');
}

/**
 * Reads the history file in stored order. A missing or unreadable file is an empty history.
 */
export function loadHistory(filePath: string): string[] {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf8');
  } catch {
    return [];
  }
  return parseHistoryText(text);
}

/**
 * Returns the history after a successful use of `entry`: a known entry moves to the front,
 * a new one is appended at the end.
 */
export function recordHistoryUse(history: readonly string[], entry: string): string[] {
  const index = history.indexOf(entry);
  if (index === -1) {
    return [...history, entry];
  }
  return [entry, ...history.slice(0, index), ...history.slice(index + 1)];
}

export function persistHistory(history: readonly string[], filePath: string): void {
  const resolvedPath = resolve(filePath);
  mkdirSync(dirname(resolvedPath), { recursive: true });
  const tempPath = `${resolvedPath}.tmp-${process.pid}-${Date.now()}-${randomUUID()}`;
  try {
    writeFileSync(tempPath, serializeHistory(history), 'utf8');
    renameSync(tempPath, resolvedPath);
  } catch (error: unknown) {
    try {
      unlinkSync(tempPath);
    } catch {
      // Temp file may never have been created.
    }
    throw error;
  }
}
