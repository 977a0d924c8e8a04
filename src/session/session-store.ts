import { createStore, type StoreApi } from 'zustand/vanilla';
import type { SessionInputEvent } from './key-input.ts';
import {
  applyLaunchFailure,
  applyLaunchSuccess,
  createInteractiveSessionState,
  reduceSessionEvent,
  type InteractiveSessionState,
  type SessionEffect,
} from './session-state.ts';

export type InteractiveSessionStore = StoreApi<InteractiveSessionState>;

export function createInteractiveSessionStore(
  initial: Partial<InteractiveSessionState> & Pick<InteractiveSessionState, 'history'>,
): InteractiveSessionStore {
  const base = createInteractiveSessionState(initial.history, initial.designerMode ?? false);
  return createStore<InteractiveSessionState>(() => ({
    ...base,
    ...initial,
  }));
}

export function applyEventToSessionStore(
  store: InteractiveSessionStore,
  event: SessionInputEvent,
): SessionEffect {
  const previous = store.getState();
  const reduced = reduceSessionEvent(previous, event);
  if (reduced.state !== previous) {
    store.setState(reduced.state, true);
  }
  return reduced.effect;
}

export function recordLaunchFailureInSessionStore(
  store: InteractiveSessionStore,
  message: string,
): void {
  store.setState(applyLaunchFailure(store.getState(), message), true);
}

export function recordLaunchSuccessInSessionStore(
  store: InteractiveSessionStore,
  history: readonly string[],
): void {
  store.setState(applyLaunchSuccess(store.getState(), history), true);
}
