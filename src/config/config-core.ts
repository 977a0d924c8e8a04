import { existsSync, readFileSync } from 'node:fs';
import { posix, resolve, win32 } from 'node:path';
import { z } from 'zod';
import { DEFAULT_HISTORY_FILE_NAME } from '../history/history-store.ts';

export const BASERUN_CONFIG_FILE_NAME = 'baserun.config.jsonc';
export const DEFAULT_STARTER_PATH = 'c:\\Program Files\\1cv8\\common\\1cestart.exe';
const DEFAULT_EVENT_LOG_PATH = '.baserun/events.jsonl';

const nonEmptyPath = z.string().trim().min(1);

const baserunConfigSchema = z.object({
  starter: z
    .object({
      path: nonEmptyPath.default(DEFAULT_STARTER_PATH),
    })
    .default({}),
  history: z
    .object({
      filePath: nonEmptyPath.default(DEFAULT_HISTORY_FILE_NAME),
    })
    .default({}),
  debug: z
    .object({
      eventLog: z
        .object({
          enabled: z.boolean().default(false),
          filePath: nonEmptyPath.default(DEFAULT_EVENT_LOG_PATH),
        })
        .default({}),
    })
    .default({}),
});

export type BaserunConfig = z.infer<typeof baserunConfigSchema>;

interface LoadedBaserunConfig {
  readonly filePath: string;
  readonly config: BaserunConfig;
  readonly error: string | null;
}

export const DEFAULT_BASERUN_CONFIG: BaserunConfig = baserunConfigSchema.parse({});

// Index of a `//` comment on one line, or -1. JSON strings never span lines.
function lineCommentStart(line: string): number {
  let inString = false;
  for (let idx = 0; idx < line.length; idx += 1) {
    const char = line[idx];
    if (inString) {
      if (char === '\\') {
        idx += 1;
      } else if (char === '"') {
        inString = false;
      }
    } else if (char === '"') {
      inString = true;
    } else if (char === '/' && line[idx + 1] === '/') {
      return idx;
    }
  }
  return -1;
}

/**
 * The config file is JSON plus `//` line comments. Block comments and trailing commas are not
 * part of the format and fail to parse.
 */
function stripLineComments(text: string): string {
  return text
    .split('\n')
    .map((line) => {
      const start = lineCommentStart(line);
      return start === -1 ? line : line.slice(0, start);
    })
    .join('\n');
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length === 0 ? '(root)' : issue.path.join('.');
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

export function parseBaserunConfigText(text: string): BaserunConfig {
  const stripped = stripLineComments(text);
  if (stripped.trim().length === 0) {
    return DEFAULT_BASERUN_CONFIG;
  }
  const parsed: unknown = JSON.parse(stripped);
  const validated = baserunConfigSchema.safeParse(parsed);
  if (!validated.success) {
    throw new Error(`invalid config: ${formatIssues(validated.error)}`);
  }
  return validated.data;
}

export function resolveBaserunConfigPath(cwd: string): string {
  return resolve(cwd, BASERUN_CONFIG_FILE_NAME);
}

export function loadBaserunConfig(options?: {
  cwd?: string;
  filePath?: string;
}): LoadedBaserunConfig {
  const cwd = options?.cwd ?? process.cwd();
  const filePath =
    options?.filePath === undefined
      ? resolveBaserunConfigPath(cwd)
      : resolve(cwd, options.filePath);

  if (!existsSync(filePath)) {
    return {
      filePath,
      config: DEFAULT_BASERUN_CONFIG,
      error: null,
    };
  }

  try {
    const raw = readFileSync(filePath, 'utf8');
    return {
      filePath,
      config: parseBaserunConfigText(raw),
      error: null,
    };
  } catch (error: unknown) {
    return {
      filePath,
      config: DEFAULT_BASERUN_CONFIG,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

function readNonEmptyEnvPath(value: string | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? null : trimmed;
}

/**
 * Resolves a configured path against `cwd`, expanding a leading `~` from `HOME`. Absolute
 * paths in either POSIX or Windows form are returned as written.
 */
export function resolveConfiguredPath(
  cwd: string,
  pathValue: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const normalizedPath = pathValue.trim();
  if (posix.isAbsolute(normalizedPath) || win32.isAbsolute(normalizedPath)) {
    return normalizedPath;
  }
  const homeDirectory = readNonEmptyEnvPath(env.HOME);
  if (homeDirectory !== null) {
    if (normalizedPath === '~') {
      return homeDirectory;
    }
    if (normalizedPath.startsWith('~/')) {
      return resolve(homeDirectory, normalizedPath.slice(2));
    }
  }
  return resolve(cwd, normalizedPath);
}
