export interface ServerConnectionDescriptor {
  readonly kind: 'server';
  readonly host: string;
  readonly refName: string;
}

export interface FileConnectionDescriptor {
  readonly kind: 'file';
  readonly path: string;
}

export interface WebConnectionDescriptor {
  readonly kind: 'web';
  readonly url: string;
}

export type ConnectionDescriptor =
  | ServerConnectionDescriptor
  | FileConnectionDescriptor
  | WebConnectionDescriptor;

export type ClassificationErrorKind =
  | 'unrecognized-descriptor'
  | 'malformed-web-form'
  | 'malformed-file-form'
  | 'malformed-server-form'
  | 'malformed-simple-form';

export interface ClassificationError {
  readonly kind: ClassificationErrorKind;
  readonly message: string;
}

export type LaunchErrorKind = 'starter-not-found' | 'spawn-failed';

export interface LaunchError {
  readonly kind: LaunchErrorKind;
  readonly message: string;
}

export function describeConnectionDescriptor(descriptor: ConnectionDescriptor): string {
  switch (descriptor.kind) {
    case 'server':
      return `server ${descriptor.host} ref ${descriptor.refName}`;
    case 'file':
      return `file ${descriptor.path}`;
    case 'web':
      return `web ${descriptor.url}`;
  }
}
