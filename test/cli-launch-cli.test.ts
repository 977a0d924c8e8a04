import assert from 'node:assert/strict';
import { existsSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { test } from 'node:test';
import { runLaunchCli, type LaunchCliIo, type LaunchCliOptions } from '../src/cli/launch-cli.ts';
import { DEFAULT_STARTER_PATH } from '../src/config/config-core.ts';
import type { StarterLaunchResult } from '../src/launch/dispatch.ts';
import type { InteractiveSessionOutcome } from '../src/session/interactive-session.ts';
import type { TerminalSessionOptions } from '../src/cli/terminal-session.ts';
import { RecordingStarter } from './support/recording-starter.ts';

interface FakeCliIo {
  readonly io: LaunchCliIo;
  readonly stderr: string[];
  readonly starterPaths: string[];
  readonly starter: RecordingStarter;
  readonly sessions: TerminalSessionOptions[];
}

function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'baserun-cli-'));
}

function createFakeIo(
  options: {
    starterResult?: StarterLaunchResult;
    interactive?: boolean;
    runSession?: (session: TerminalSessionOptions) => InteractiveSessionOutcome;
  } = {},
): FakeCliIo {
  const stderr: string[] = [];
  const starterPaths: string[] = [];
  const sessions: TerminalSessionOptions[] = [];
  const starter = new RecordingStarter(options.starterResult);
  const runSession =
    options.runSession ??
    ((session: TerminalSessionOptions): InteractiveSessionOutcome => ({
      exitReason: 'cancelled',
      history: session.history,
      designerMode: session.designerMode,
      launched: null,
      historyPersistError: null,
    }));
  return {
    stderr,
    starterPaths,
    starter,
    sessions,
    io: {
      writeStderr: (text) => {
        stderr.push(text);
      },
      createStarter: (executablePath) => {
        starterPaths.push(executablePath);
        return starter;
      },
      isInteractiveTerminal: () => options.interactive ?? false,
      runInteractive: (session) => {
        sessions.push(session);
        return Promise.resolve(runSession(session));
      },
    },
  };
}

function cliOptions(cwd: string, overrides: Partial<LaunchCliOptions> = {}): LaunchCliOptions {
  return {
    descriptor: null,
    designer: false,
    starterPath: null,
    configPath: null,
    cwd,
    env: { HOME: cwd },
    ...overrides,
  };
}

void test('descriptor argument launches once with the default starter', async () => {
  const dir = makeTempDir();
  const fake = createFakeIo();
  const code = await runLaunchCli(cliOptions(dir, { descriptor: 'h;r' }), fake.io);
  assert.equal(code, 0);
  assert.deepEqual(fake.stderr, []);
  assert.deepEqual(fake.starterPaths, [DEFAULT_STARTER_PATH]);
  assert.deepEqual(fake.starter.calls, [{ mode: 'ENTERPRISE', flag: '/S', argument: 'h\\r' }]);
  assert.equal(existsSync(join(dir, 'baserun_history.txt')), false);
});

void test('designer flag selects the designer mode token', async () => {
  const dir = makeTempDir();
  const fake = createFakeIo();
  const code = await runLaunchCli(
    cliOptions(dir, { descriptor: 'ws="http://web.test/App";', designer: true }),
    fake.io,
  );
  assert.equal(code, 0);
  assert.deepEqual(fake.starter.calls, [
    { mode: 'DESIGNER', flag: '/WS', argument: 'http://web.test/App' },
  ]);
});

void test('parsing failure prints the prefixed error and exits 1', async () => {
  const dir = makeTempDir();
  const fake = createFakeIo();
  const code = await runLaunchCli(cliOptions(dir, { descriptor: 'garbage' }), fake.io);
  assert.equal(code, 1);
  assert.deepEqual(fake.stderr, ['Parsing error: Could not parse provided path: garbage\n']);
  assert.equal(fake.starter.calls.length, 0);
});

void test('launcher failure prints the prefixed error and exits 1', async () => {
  const dir = makeTempDir();
  const fake = createFakeIo({
    starterResult: {
      ok: false,
      reason: 'not-found',
      message: "Could not locate starter app: '/opt/starter'",
    },
  });
  const code = await runLaunchCli(cliOptions(dir, { descriptor: 'h;r' }), fake.io);
  assert.equal(code, 1);
  assert.deepEqual(fake.stderr, [
    "Launcher error: Could not locate starter app: '/opt/starter'\n",
  ]);
});

void test('starter path comes from config and the flag overrides it', async () => {
  const dir = makeTempDir();
  writeFileSync(
    join(dir, 'baserun.config.jsonc'),
    '{\n  // per-machine starter\n  "starter": { "path": "/opt/cfg-starter" }\n}',
    'utf8',
  );
  const fromConfig = createFakeIo();
  await runLaunchCli(cliOptions(dir, { descriptor: 'h;r' }), fromConfig.io);
  assert.deepEqual(fromConfig.starterPaths, ['/opt/cfg-starter']);

  const fromFlag = createFakeIo();
  await runLaunchCli(
    cliOptions(dir, { descriptor: 'h;r', starterPath: 'bin/starter' }),
    fromFlag.io,
  );
  assert.deepEqual(fromFlag.starterPaths, [join(dir, 'bin/starter')]);
});

void test('invalid config is reported and defaults apply', async () => {
  const dir = makeTempDir();
  writeFileSync(join(dir, 'baserun.config.jsonc'), '{"starter": {"path": 5}}', 'utf8');
  const fake = createFakeIo();
  const code = await runLaunchCli(cliOptions(dir, { descriptor: 'h;r' }), fake.io);
  assert.equal(code, 0);
  assert.equal(fake.stderr.length, 1);
  assert.equal(
    fake.stderr[0]?.startsWith(
      `baserun: ignoring config ${join(dir, 'baserun.config.jsonc')}: invalid config: starter.path: `,
    ),
    true,
  );
  assert.deepEqual(fake.starterPaths, [DEFAULT_STARTER_PATH]);
});

void test('interactive mode needs a terminal', async () => {
  const dir = makeTempDir();
  const fake = createFakeIo({ interactive: false });
  const code = await runLaunchCli(cliOptions(dir), fake.io);
  assert.equal(code, 2);
  assert.deepEqual(fake.stderr, [
    'baserun: interactive mode needs a terminal; pass a descriptor argument\n',
  ]);
  assert.equal(fake.sessions.length, 0);
});

void test('interactive mode loads and persists the history file', async () => {
  const dir = makeTempDir();
  const historyPath = join(dir, 'baserun_history.txt');
  writeFileSync(historyPath, 'a;b\nc;d\n', 'utf8');
  const fake = createFakeIo({
    interactive: true,
    runSession: (session) => {
      session.persistHistory(['c;d', 'a;b']);
      return {
        exitReason: 'launched',
        history: ['c;d', 'a;b'],
        designerMode: session.designerMode,
        launched: null,
        historyPersistError: null,
      };
    },
  });
  const code = await runLaunchCli(cliOptions(dir, { designer: true }), fake.io);
  assert.equal(code, 0);
  assert.deepEqual(fake.stderr, []);
  assert.deepEqual(fake.sessions[0]?.history, ['a;b', 'c;d']);
  assert.equal(fake.sessions[0]?.designerMode, true);
  assert.equal(readFileSync(historyPath, 'utf8'), 'c;d\na;b\n');
});

void test('history persist failure is reported without failing the run', async () => {
  const dir = makeTempDir();
  const fake = createFakeIo({
    interactive: true,
    runSession: (session) => ({
      exitReason: 'launched',
      history: ['h;r'],
      designerMode: session.designerMode,
      launched: null,
      historyPersistError: 'disk full',
    }),
  });
  const code = await runLaunchCli(cliOptions(dir), fake.io);
  assert.equal(code, 0);
  assert.deepEqual(fake.stderr, [
    `baserun: could not save history to ${join(dir, 'baserun_history.txt')}: disk full\n`,
  ]);
});

void test('event log records config and classification events when enabled', async () => {
  const dir = makeTempDir();
  writeFileSync(
    join(dir, 'baserun.config.jsonc'),
    '{"debug": {"eventLog": {"enabled": true, "filePath": "logs/events.jsonl"}}}',
    'utf8',
  );
  const fake = createFakeIo();
  await runLaunchCli(cliOptions(dir, { descriptor: 'garbage' }), fake.io);
  const names = readFileSync(join(dir, 'logs', 'events.jsonl'), 'utf8')
    .trimEnd()
    .split('\n')
    .map((line): unknown => JSON.parse(line))
    .map((record) =>
      typeof record === 'object' && record !== null && 'name' in record ? record.name : null,
    );
  assert.deepEqual(names, ['config.loaded', 'descriptor.rejected']);
});

void test('an unusable event log path is reported and the launch still runs', async () => {
  const dir = makeTempDir();
  writeFileSync(join(dir, 'blocker'), 'not a directory', 'utf8');
  writeFileSync(
    join(dir, 'baserun.config.jsonc'),
    '{"debug": {"eventLog": {"enabled": true, "filePath": "blocker/events.jsonl"}}}',
    'utf8',
  );
  const fake = createFakeIo();
  const code = await runLaunchCli(cliOptions(dir, { descriptor: 'h;r' }), fake.io);
  assert.equal(code, 0);
  assert.deepEqual(fake.starter.calls, [{ mode: 'ENTERPRISE', flag: '/S', argument: 'h\\r' }]);
  assert.equal(fake.stderr.length, 1);
  assert.equal(
    fake.stderr[0]?.startsWith(
      `baserun: event log disabled: ${join(dir, 'blocker', 'events.jsonl')}: `,
    ),
    true,
  );
});
