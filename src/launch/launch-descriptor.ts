import { classifyDescriptor } from '../descriptor/classify.ts';
import {
  describeConnectionDescriptor,
  type ClassificationErrorKind,
  type ConnectionDescriptor,
  type LaunchErrorKind,
} from '../domain/descriptors.ts';
import { errResult, okResult, type Result } from '../domain/result.ts';
import { recordEvent } from '../log/event-log.ts';
import { dispatchDescriptor, type ExternalStarter, type StarterInvocation } from './dispatch.ts';

export interface LaunchedDescriptor {
  readonly descriptor: ConnectionDescriptor;
  readonly invocation: StarterInvocation;
}

export interface LaunchAttemptFailure {
  readonly stage: 'parsing' | 'launch';
  readonly kind: ClassificationErrorKind | LaunchErrorKind;
  readonly message: string;
}

export type LaunchAttemptResult = Result<LaunchedDescriptor, LaunchAttemptFailure>;

export function formatLaunchAttemptFailure(failure: LaunchAttemptFailure): string {
  const prefix = failure.stage === 'parsing' ? 'Parsing error' : 'Launcher error';
  return `${prefix}: ${failure.message}`;
}

export async function classifyAndLaunch(
  text: string,
  designerMode: boolean,
  starter: ExternalStarter,
): Promise<LaunchAttemptResult> {
  const classified = classifyDescriptor(text);
  if (!classified.ok) {
    recordEvent('descriptor.rejected', { kind: classified.error.kind });
    const failure: LaunchAttemptFailure = {
      stage: 'parsing',
      kind: classified.error.kind,
      message: classified.error.message,
    };
    return errResult(failure);
  }

  const descriptor = classified.value;
  recordEvent('descriptor.classified', {
    kind: descriptor.kind,
    descriptor: describeConnectionDescriptor(descriptor),
  });
  const dispatched = await dispatchDescriptor(descriptor, designerMode, starter);
  if (!dispatched.ok) {
    recordEvent('launch.failed', {
      kind: dispatched.error.kind,
      message: dispatched.error.message,
    });
    const failure: LaunchAttemptFailure = {
      stage: 'launch',
      kind: dispatched.error.kind,
      message: dispatched.error.message,
    };
    return errResult(failure);
  }

  recordEvent('launch.started', {
    mode: dispatched.value.mode,
    flag: dispatched.value.flag,
  });
  return okResult({ descriptor, invocation: dispatched.value });
}
