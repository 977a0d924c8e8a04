import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { existsSync } from 'node:fs';
import type {
  ExternalStarter,
  StarterFormFlag,
  StarterLaunchResult,
  StarterMode,
} from './dispatch.ts';

type SpawnProcess = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildProcess;

interface NodeStarterOptions {
  readonly executablePath: string;
  readonly fileExists?: (path: string) => boolean;
  readonly spawnProcess?: SpawnProcess;
}

const NOT_FOUND_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'ENOTDIR']);

function readErrorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return null;
  }
  return typeof error.code === 'string' ? error.code : null;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class NodeStarter implements ExternalStarter {
  private readonly fileExists: (path: string) => boolean;
  private readonly spawnProcess: SpawnProcess;

  constructor(private readonly options: NodeStarterOptions) {
    this.fileExists = options.fileExists ?? existsSync;
    this.spawnProcess = options.spawnProcess ?? spawn;
  }

  async launch(
    mode: StarterMode,
    flag: StarterFormFlag,
    argument: string,
  ): Promise<StarterLaunchResult> {
    const executablePath = this.options.executablePath;
    if (!this.fileExists(executablePath)) {
      return this.notFound();
    }

    let child: ChildProcess;
    try {
      child = this.spawnProcess(executablePath, [mode, flag, argument], {
        detached: true,
        stdio: 'ignore',
        windowsHide: true,
      });
    } catch (error: unknown) {
      return this.failure(error);
    }

    const outcome = await new Promise<StarterLaunchResult>((resolve) => {
      const onSpawn = (): void => {
        child.off('error', onError);
        resolve({ ok: true });
      };
      const onError = (error: Error): void => {
        child.off('spawn', onSpawn);
        resolve(this.failure(error));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
    if (outcome.ok) {
      child.unref();
    }
    return outcome;
  }

  private notFound(): StarterLaunchResult {
    return {
      ok: false,
      reason: 'not-found',
      message: `Could not locate starter app: '${this.options.executablePath}'`,
    };
  }

  private failure(error: unknown): StarterLaunchResult {
    const code = readErrorCode(error);
    if (code !== null && NOT_FOUND_ERROR_CODES.has(code)) {
      return this.notFound();
    }
    return {
      ok: false,
      reason: 'spawn-failed',
      message: describeError(error),
    };
  }
}
