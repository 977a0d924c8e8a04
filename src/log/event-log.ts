import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

type EventAttrValue = boolean | number | string;
type EventAttrs = Readonly<Record<string, EventAttrValue>>;

interface EventLogConfig {
  enabled: boolean;
  filePath?: string;
}

interface EventLogRecord {
  type: 'event';
  name: string;
  'ts-ms': number;
  attrs?: EventAttrs;
}

interface EventLogSink {
  readonly filePath: string;
  readonly now: () => number;
}

const DEFAULT_FILE_PATH = '.baserun/events.jsonl';

let sink: EventLogSink | null = null;
let failure: string | null = null;

function describeFailure(filePath: string, error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `${filePath}: ${message}`;
}

/**
 * Points the log at a JSONL file, or turns it off. Replaces any earlier configuration and clears
 * a recorded failure. If the log directory cannot be created the log stays off and the failure
 * is kept for `shutdownEventLog`.
 */
export function configureEventLog(config: EventLogConfig, now: () => number = Date.now): void {
  sink = null;
  failure = null;
  if (!config.enabled) {
    return;
  }
  const filePath = resolve(config.filePath ?? DEFAULT_FILE_PATH);
  try {
    mkdirSync(dirname(filePath), { recursive: true });
  } catch (error: unknown) {
    failure = describeFailure(filePath, error);
    return;
  }
  sink = { filePath, now };
}

// Appends one record synchronously. The first failed write turns the log off.
export function recordEvent(name: string, attrs?: EventAttrs): void {
  if (sink === null) {
    return;
  }
  const record: EventLogRecord = {
    type: 'event',
    name,
    'ts-ms': sink.now(),
  };
  if (attrs !== undefined) {
    record.attrs = attrs;
  }
  try {
    appendFileSync(sink.filePath, `${JSON.stringify(record)}\n`, 'utf8');
  } catch (error: unknown) {
    failure = describeFailure(sink.filePath, error);
    sink = null;
  }
}

/**
 * Turns the log off and returns the failure that disabled it, if any.
 */
export function shutdownEventLog(): string | null {
  const reported = failure;
  sink = null;
  failure = null;
  return reported;
}
