import type {
  ClassificationError,
  ClassificationErrorKind,
  ConnectionDescriptor,
} from '../domain/descriptors.ts';
import { errResult, okResult, type Result } from '../domain/result.ts';

export type ClassifyResult = Result<ConnectionDescriptor, ClassificationError>;

interface DescriptorFormRule {
  readonly matches: (text: string) => boolean;
  readonly parse: (text: string) => ClassifyResult;
}

// `[^\n]` rather than `.`: only a line feed ends a segment, so \r, U+2028 and U+2029 are kept.
const QUOTED_SEGMENT_PATTERN = /"([^\n]+)"/u;
const SERVER_FORM_PATTERN = /"([^\n]+)"[^\n]+"([^\n]+)"/u;
const SIMPLE_FORM_PATTERN = /([^\n]+);([^\n]+)/u;

function accepted(descriptor: ConnectionDescriptor): ClassifyResult {
  return okResult(descriptor);
}

function malformed(kind: ClassificationErrorKind, message: string): ClassifyResult {
  return errResult({ kind, message });
}

function parseWebForm(text: string): ClassifyResult {
  const match = QUOTED_SEGMENT_PATTERN.exec(text);
  const url = match?.[1];
  if (url === undefined) {
    return malformed('malformed-web-form', 'expected pattern: ws="<url>";');
  }
  return accepted({ kind: 'web', url });
}

function parseFileForm(text: string): ClassifyResult {
  const match = QUOTED_SEGMENT_PATTERN.exec(text);
  const path = match?.[1];
  if (path === undefined) {
    return malformed('malformed-file-form', 'expected pattern: File="<path>";');
  }
  return accepted({ kind: 'file', path });
}

function parseServerForm(text: string): ClassifyResult {
  const match = SERVER_FORM_PATTERN.exec(text);
  const host = match?.[1];
  const refName = match?.[2];
  if (host === undefined || refName === undefined) {
    return malformed('malformed-server-form', 'expected pattern: Srvr="host";Ref="ref";');
  }
  return accepted({ kind: 'server', host, refName });
}

function parseSimpleForm(text: string): ClassifyResult {
  const match = SIMPLE_FORM_PATTERN.exec(text);
  const host = match?.[1];
  const refName = match?.[2];
  if (host === undefined || refName === undefined) {
    return malformed('malformed-simple-form', 'expected pattern: host;ref');
  }
  return accepted({ kind: 'server', host, refName });
}

// Evaluated in order against the lower-cased text; the first rule whose marker is present decides.
const LOWER_CASED_FORM_RULES: readonly DescriptorFormRule[] = [
  {
    matches: (text) => text.includes('file='),
    parse: parseFileForm,
  },
  {
    matches: (text) => text.includes('srvr=') && text.includes('ref='),
    parse: parseServerForm,
  },
  {
    matches: (text) => text.includes(';'),
    parse: parseSimpleForm,
  },
];

const WEB_FORM_RULE: DescriptorFormRule = {
  matches: (text) => text.includes('ws='),
  parse: parseWebForm,
};

export function classifyDescriptor(raw: string): ClassifyResult {
  const trimmed = raw.trim();
  // The web form is the only one matched case-sensitively and extracted without lower-casing.
  if (WEB_FORM_RULE.matches(trimmed)) {
    return WEB_FORM_RULE.parse(trimmed);
  }

  const lowered = trimmed.toLowerCase();
  for (const rule of LOWER_CASED_FORM_RULES) {
    if (rule.matches(lowered)) {
      return rule.parse(lowered);
    }
  }
  return malformed('unrecognized-descriptor', `Could not parse provided path: ${raw}`);
}
