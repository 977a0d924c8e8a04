import type { ExternalStarter } from '../launch/dispatch.ts';
import {
  runInteractiveSession,
  type InteractiveSessionOutcome,
} from '../session/interactive-session.ts';
import type { InteractiveSessionState } from '../session/session-state.ts';
import {
  createTerminalModeManager,
  readSessionInputEvents,
  terminalSize,
} from '../terminal/terminal-io.ts';
import { buildSessionFrame, renderSessionFrameAnsi } from '../ui/session-view.ts';

export interface TerminalSessionOptions {
  readonly history: readonly string[];
  readonly designerMode: boolean;
  readonly starter: ExternalStarter;
  readonly persistHistory: (history: readonly string[]) => void;
}

export function isInteractiveTerminal(): boolean {
  return process.stdin.isTTY === true && process.stdout.isTTY === true;
}

export async function runTerminalSession(
  options: TerminalSessionOptions,
): Promise<InteractiveSessionOutcome> {
  const modes = createTerminalModeManager((sequence) => {
    process.stdout.write(sequence);
  });
  let lastState: InteractiveSessionState | null = null;
  const draw = (state: InteractiveSessionState): void => {
    lastState = state;
    process.stdout.write(renderSessionFrameAnsi(buildSessionFrame(state, terminalSize())));
  };
  const onResize = (): void => {
    if (lastState !== null) {
      process.stdout.write('\u001b[2J');
      draw(lastState);
    }
  };

  process.stdin.setRawMode(true);
  process.stdin.resume();
  modes.enable();
  process.stdout.on('resize', onResize);
  try {
    return await runInteractiveSession({
      history: options.history,
      designerMode: options.designerMode,
      starter: options.starter,
      persistHistory: options.persistHistory,
      events: readSessionInputEvents(process.stdin.iterator({ destroyOnReturn: false })),
      render: draw,
    });
  } finally {
    process.stdout.off('resize', onResize);
    modes.restore();
    process.stdin.setRawMode(false);
    process.stdin.pause();
  }
}
