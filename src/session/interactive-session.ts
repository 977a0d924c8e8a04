import { recordHistoryUse } from '../history/history-store.ts';
import type { ExternalStarter } from '../launch/dispatch.ts';
import {
  classifyAndLaunch,
  formatLaunchAttemptFailure,
  type LaunchedDescriptor,
} from '../launch/launch-descriptor.ts';
import { recordEvent } from '../log/event-log.ts';
import type { SessionInputEvent } from './key-input.ts';
import type { InteractiveSessionState, SessionExitReason } from './session-state.ts';
import {
  applyEventToSessionStore,
  createInteractiveSessionStore,
  recordLaunchFailureInSessionStore,
  recordLaunchSuccessInSessionStore,
} from './session-store.ts';

interface InteractiveSessionOptions {
  readonly history: readonly string[];
  readonly designerMode?: boolean;
  readonly starter: ExternalStarter;
  readonly events: AsyncIterable<SessionInputEvent>;
  readonly persistHistory: (history: readonly string[]) => void;
  readonly render?: (state: InteractiveSessionState) => void;
}

export interface InteractiveSessionOutcome {
  readonly exitReason: SessionExitReason | 'input-closed';
  readonly history: readonly string[];
  readonly designerMode: boolean;
  readonly launched: LaunchedDescriptor | null;
  readonly historyPersistError: string | null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs the interactive loop: each event is applied in full (state, launch, redraw) before the
 * next one is read. Returns once the user cancels, a launch succeeds or input ends.
 */
export async function runInteractiveSession(
  options: InteractiveSessionOptions,
): Promise<InteractiveSessionOutcome> {
  const store = createInteractiveSessionStore({
    history: options.history,
    designerMode: options.designerMode ?? false,
  });
  const render = options.render;
  const unsubscribe = render === undefined ? null : store.subscribe((state) => render(state));
  render?.(store.getState());

  const outcome = (
    exitReason: InteractiveSessionOutcome['exitReason'],
    launched: LaunchedDescriptor | null = null,
    historyPersistError: string | null = null,
  ): InteractiveSessionOutcome => {
    const state = store.getState();
    recordEvent('session.exited', { reason: exitReason });
    return {
      exitReason,
      history: state.history,
      designerMode: state.designerMode,
      launched,
      historyPersistError,
    };
  };

  try {
    for await (const event of options.events) {
      const effect = applyEventToSessionStore(store, event);
      if (effect.type === 'launch') {
        const attempt = await classifyAndLaunch(effect.text, effect.designerMode, options.starter);
        if (!attempt.ok) {
          recordLaunchFailureInSessionStore(store, formatLaunchAttemptFailure(attempt.error));
          continue;
        }

        const history = recordHistoryUse(store.getState().history, effect.text.trim());
        let historyPersistError: string | null = null;
        try {
          options.persistHistory(history);
        } catch (error: unknown) {
          historyPersistError = errorMessage(error);
          recordEvent('history.persist-failed', { message: historyPersistError });
        }
        recordLaunchSuccessInSessionStore(store, history);
        return outcome('launched', attempt.value, historyPersistError);
      }
      if (store.getState().exitReason === 'cancelled') {
        return outcome('cancelled');
      }
    }
    return outcome('input-closed');
  } finally {
    unsubscribe?.();
  }
}
