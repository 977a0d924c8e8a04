import {
  loadBaserunConfig,
  resolveConfiguredPath,
  type BaserunConfig,
} from '../config/config-core.ts';
import { loadHistory, persistHistory } from '../history/history-store.ts';
import type { ExternalStarter } from '../launch/dispatch.ts';
import { classifyAndLaunch, formatLaunchAttemptFailure } from '../launch/launch-descriptor.ts';
import { NodeStarter } from '../launch/node-starter.ts';
import { configureEventLog, recordEvent, shutdownEventLog } from '../log/event-log.ts';
import type { InteractiveSessionOutcome } from '../session/interactive-session.ts';
import {
  isInteractiveTerminal,
  runTerminalSession,
  type TerminalSessionOptions,
} from './terminal-session.ts';

export interface LaunchCliOptions {
  readonly descriptor: string | null;
  readonly designer: boolean;
  readonly starterPath: string | null;
  readonly configPath: string | null;
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
}

export interface LaunchCliIo {
  readonly writeStderr: (text: string) => void;
  readonly createStarter: (executablePath: string) => ExternalStarter;
  readonly isInteractiveTerminal: () => boolean;
  readonly runInteractive: (options: TerminalSessionOptions) => Promise<InteractiveSessionOutcome>;
}

const DEFAULT_LAUNCH_CLI_IO: LaunchCliIo = {
  writeStderr: (text) => {
    process.stderr.write(text);
  },
  createStarter: (executablePath) => new NodeStarter({ executablePath }),
  isInteractiveTerminal,
  runInteractive: runTerminalSession,
};

interface ResolvedLaunchPaths {
  readonly starterPath: string;
  readonly historyPath: string;
  readonly eventLogPath: string;
}

function resolveLaunchPaths(
  config: BaserunConfig,
  options: LaunchCliOptions,
  cwd: string,
  env: NodeJS.ProcessEnv,
): ResolvedLaunchPaths {
  return {
    starterPath: resolveConfiguredPath(cwd, options.starterPath ?? config.starter.path, env),
    historyPath: resolveConfiguredPath(cwd, config.history.filePath, env),
    eventLogPath: resolveConfiguredPath(cwd, config.debug.eventLog.filePath, env),
  };
}

async function runDescriptorOnce(
  descriptor: string,
  designer: boolean,
  starter: ExternalStarter,
  io: LaunchCliIo,
): Promise<number> {
  const attempt = await classifyAndLaunch(descriptor, designer, starter);
  if (!attempt.ok) {
    io.writeStderr(`${formatLaunchAttemptFailure(attempt.error)}\n`);
    return 1;
  }
  return 0;
}

async function runInteractiveOnce(
  paths: ResolvedLaunchPaths,
  designer: boolean,
  starter: ExternalStarter,
  io: LaunchCliIo,
): Promise<number> {
  if (!io.isInteractiveTerminal()) {
    io.writeStderr('baserun: interactive mode needs a terminal; pass a descriptor argument\n');
    return 2;
  }
  const history = loadHistory(paths.historyPath);
  recordEvent('history.loaded', { entries: history.length });
  const outcome = await io.runInteractive({
    history,
    designerMode: designer,
    starter,
    persistHistory: (next) => {
      persistHistory(next, paths.historyPath);
    },
  });
  if (outcome.historyPersistError !== null) {
    io.writeStderr(
      `baserun: could not save history to ${paths.historyPath}: ${outcome.historyPersistError}\n`,
    );
  }
  return 0;
}

export async function runLaunchCli(
  options: LaunchCliOptions,
  io: LaunchCliIo = DEFAULT_LAUNCH_CLI_IO,
): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const loaded = loadBaserunConfig(
    options.configPath === null ? { cwd } : { cwd, filePath: options.configPath },
  );
  const paths = resolveLaunchPaths(loaded.config, options, cwd, env);
  try {
    configureEventLog({
      enabled: loaded.config.debug.eventLog.enabled,
      filePath: paths.eventLogPath,
    });
    if (loaded.error === null) {
      recordEvent('config.loaded', { filePath: loaded.filePath });
    } else {
      io.writeStderr(`baserun: ignoring config ${loaded.filePath}: ${loaded.error}\n`);
      recordEvent('config.invalid', { filePath: loaded.filePath, error: loaded.error });
    }
    const starter = io.createStarter(paths.starterPath);
    if (options.descriptor !== null) {
      return await runDescriptorOnce(options.descriptor, options.designer, starter, io);
    }
    return await runInteractiveOnce(paths, options.designer, starter, io);
  } finally {
    const logFailure = shutdownEventLog();
    if (logFailure !== null) {
      io.writeStderr(`baserun: event log disabled: ${logFailure}\n`);
    }
  }
}
