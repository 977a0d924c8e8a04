import type { ConnectionDescriptor, LaunchError } from '../domain/descriptors.ts';
import { errResult, okResult, type Result } from '../domain/result.ts';

export type StarterMode = 'DESIGNER' | 'ENTERPRISE';
export type StarterFormFlag = '/S' | '/F' | '/WS';

// Joins cluster host and infobase name for the /S form.
export const STARTER_SERVER_SEPARATOR = '\\';

export interface StarterInvocation {
  readonly mode: StarterMode;
  readonly flag: StarterFormFlag;
  readonly argument: string;
}

export type StarterLaunchResult =
  | { readonly ok: true }
  | {
      readonly ok: false;
      readonly reason: 'not-found' | 'spawn-failed';
      readonly message: string;
    };

export interface ExternalStarter {
  launch(mode: StarterMode, flag: StarterFormFlag, argument: string): Promise<StarterLaunchResult>;
}

export type DispatchResult = Result<StarterInvocation, LaunchError>;

export function resolveStarterMode(designerMode: boolean): StarterMode {
  return designerMode ? 'DESIGNER' : 'ENTERPRISE';
}

export function buildStarterInvocation(
  descriptor: ConnectionDescriptor,
  designerMode: boolean,
): StarterInvocation {
  const mode = resolveStarterMode(designerMode);
  switch (descriptor.kind) {
    case 'server':
      return {
        mode,
        flag: '/S',
        argument: `${descriptor.host}${STARTER_SERVER_SEPARATOR}${descriptor.refName}`,
      };
    case 'file':
      return {
        mode,
        flag: '/F',
        argument: descriptor.path,
      };
    case 'web':
      return {
        mode,
        flag: '/WS',
        argument: descriptor.url,
      };
  }
}

export async function dispatchDescriptor(
  descriptor: ConnectionDescriptor,
  designerMode: boolean,
  starter: ExternalStarter,
): Promise<DispatchResult> {
  const invocation = buildStarterInvocation(descriptor, designerMode);
  const launched = await starter.launch(invocation.mode, invocation.flag, invocation.argument);
  if (launched.ok) {
    return okResult(invocation);
  }
  const error: LaunchError = {
    kind: launched.reason === 'not-found' ? 'starter-not-found' : 'spawn-failed',
    message: launched.message,
  };
  return errResult(error);
}
