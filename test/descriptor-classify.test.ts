import assert from 'node:assert/strict';
import { test } from 'node:test';
import { classifyDescriptor } from '../src/descriptor/classify.ts';

void test('simple form lower-cases host and ref', () => {
  assert.deepEqual(classifyDescriptor('SomeHost;SomeRef'), {
    ok: true,
    value: { kind: 'server', host: 'somehost', refName: 'someref' },
  });
});

void test('simple form splits on the last semicolon', () => {
  assert.deepEqual(classifyDescriptor('a;b;c'), {
    ok: true,
    value: { kind: 'server', host: 'a;b', refName: 'c' },
  });
});

void test('server/ref form extracts both quoted segments', () => {
  assert.deepEqual(classifyDescriptor('Srvr="h";Ref="r";'), {
    ok: true,
    value: { kind: 'server', host: 'h', refName: 'r' },
  });
});

void test('carriage returns and unicode line separators stay inside segments', () => {
  assert.deepEqual(classifyDescriptor('srvr="h\r";ref="r"'), {
    ok: true,
    value: { kind: 'server', host: 'h\r', refName: 'r' },
  });
  assert.deepEqual(classifyDescriptor('a\u2028;b\u2029'), {
    ok: true,
    value: { kind: 'server', host: 'a\u2028', refName: 'b' },
  });
  assert.deepEqual(classifyDescriptor('ws="http://web.test/\u2029App";'), {
    ok: true,
    value: { kind: 'web', url: 'http://web.test/\u2029App' },
  });
});

void test('a line feed still ends a segment', () => {
  assert.deepEqual(classifyDescriptor('File="a\nb"'), {
    ok: false,
    error: { kind: 'malformed-file-form', message: 'expected pattern: File="<path>";' },
  });
});

void test('file form keeps backslashes and lower-cases the path', () => {
  assert.deepEqual(classifyDescriptor('File="C:\\base.1cd"'), {
    ok: true,
    value: { kind: 'file', path: 'c:\\base.1cd' },
  });
  assert.deepEqual(classifyDescriptor('  File="D:\\Bases\\Trade";  '), {
    ok: true,
    value: { kind: 'file', path: 'd:\\bases\\trade' },
  });
});

void test('web form keeps the original casing', () => {
  assert.deepEqual(classifyDescriptor('ws="https://Example.test/App";'), {
    ok: true,
    value: { kind: 'web', url: 'https://Example.test/App' },
  });
});

void test('web marker is matched case-sensitively', () => {
  assert.deepEqual(classifyDescriptor('  WS="x"  '), {
    ok: false,
    error: {
      kind: 'unrecognized-descriptor',
      message: 'Could not parse provided path:   WS="x"  ',
    },
  });
});

void test('file marker wins over server and simple markers', () => {
  assert.deepEqual(classifyDescriptor('srvr="h";ref="r";file="f"'), {
    ok: true,
    value: { kind: 'file', path: 'h";ref="r";file="f' },
  });
});

void test('malformed forms report the expected pattern', () => {
  assert.deepEqual(classifyDescriptor('ws=nothing'), {
    ok: false,
    error: { kind: 'malformed-web-form', message: 'expected pattern: ws="<url>";' },
  });
  assert.deepEqual(classifyDescriptor('File=c:\\base'), {
    ok: false,
    error: { kind: 'malformed-file-form', message: 'expected pattern: File="<path>";' },
  });
  assert.deepEqual(classifyDescriptor('Srvr=host;Ref=ref'), {
    ok: false,
    error: {
      kind: 'malformed-server-form',
      message: 'expected pattern: Srvr="host";Ref="ref";',
    },
  });
  assert.deepEqual(classifyDescriptor(';ref'), {
    ok: false,
    error: { kind: 'malformed-simple-form', message: 'expected pattern: host;ref' },
  });
  assert.deepEqual(classifyDescriptor('host;'), {
    ok: false,
    error: { kind: 'malformed-simple-form', message: 'expected pattern: host;ref' },
  });
});

void test('text without any marker is unrecognized', () => {
  assert.deepEqual(classifyDescriptor('garbage'), {
    ok: false,
    error: {
      kind: 'unrecognized-descriptor',
      message: 'Could not parse provided path: garbage',
    },
  });
});
