import assert from 'node:assert/strict';
import test from 'node:test';
import {
  DEFAULT_RUNTIME_COMMAND_PARSERS,
  parseRuntimeCommand,
} from '../src/control-plane/runtime-command-parser.ts';
import { CommandError, RUNTIME_CAPABILITIES } from '../src/runtime/runtime-state.ts';

function assertCommandError(run: () => unknown, message: string): void {
  assert.throws(run, (error: unknown) => {
    assert.equal(error instanceof CommandError, true);
    assert.equal(error instanceof Error ? error.message : '', message);
    return true;
  });
}

const bundle = {
  project: { name: 'Demo' },
  pages: {},
  vars: {},
  sources: { 'main.st': 'x' },
};

void test('parser registry covers every advertised capability', () => {
  assert.deepEqual(Object.keys(DEFAULT_RUNTIME_COMMAND_PARSERS).sort(), [...RUNTIME_CAPABILITIES].sort());
});

void test('parseRuntimeCommand maps payload-free commands', () => {
  assert.deepEqual(parseRuntimeCommand('PING', {}), { cmd: 'PING' });
  assert.deepEqual(parseRuntimeCommand('GET_STATUS', { ignored: true }), { cmd: 'GET_STATUS' });
  assert.deepEqual(parseRuntimeCommand('SHUTDOWN', {}), { cmd: 'SHUTDOWN' });
});

void test('parseRuntimeCommand rejects unknown and differently cased names', () => {
  assertCommandError(() => parseRuntimeCommand('FLY', {}), 'Unknown cmd: FLY');
  assertCommandError(() => parseRuntimeCommand('ping', {}), 'Unknown cmd: ping');
  assertCommandError(() => parseRuntimeCommand('toString', {}), 'Unknown cmd: toString');
});

void test('READ_VARS defaults names and requires strings', () => {
  assert.deepEqual(parseRuntimeCommand('READ_VARS', {}), { cmd: 'READ_VARS', names: [] });
  assert.deepEqual(parseRuntimeCommand('READ_VARS', { names: ['a', 'b'] }), {
    cmd: 'READ_VARS',
    names: ['a', 'b'],
  });
  assertCommandError(
    () => parseRuntimeCommand('READ_VARS', { names: 'a' }),
    'payload.names must be array of strings',
  );
  assertCommandError(
    () => parseRuntimeCommand('READ_VARS', { names: ['a', 3] }),
    'payload.names must be array of strings',
  );
});

void test('SET_VARS requires an object of values', () => {
  assert.deepEqual(parseRuntimeCommand('SET_VARS', { values: { a: 1 } }), {
    cmd: 'SET_VARS',
    values: { a: 1 },
  });
  assert.deepEqual(parseRuntimeCommand('SET_VARS', {}), { cmd: 'SET_VARS', values: {} });
  assertCommandError(
    () => parseRuntimeCommand('SET_VARS', { values: [1] }),
    'payload.values must be object',
  );
});

void test('FORCE_SET requires a non-empty owner id', () => {
  assert.deepEqual(parseRuntimeCommand('FORCE_SET', { owner_id: 'o1', values: { x: 5 } }), {
    cmd: 'FORCE_SET',
    ownerId: 'o1',
    values: { x: 5 },
  });
  assertCommandError(() => parseRuntimeCommand('FORCE_SET', { values: {} }), 'payload.owner_id required');
  assertCommandError(
    () => parseRuntimeCommand('FORCE_SET', { owner_id: '', values: {} }),
    'payload.owner_id required',
  );
  assertCommandError(
    () => parseRuntimeCommand('FORCE_SET', { owner_id: 'o1', values: 'x' }),
    'payload.values must be object',
  );
});

void test('FORCE_CLEAR distinguishes absent names from a names list', () => {
  assert.deepEqual(parseRuntimeCommand('FORCE_CLEAR', { owner_id: 'o1' }), {
    cmd: 'FORCE_CLEAR',
    ownerId: 'o1',
    names: null,
    all: false,
  });
  assert.deepEqual(parseRuntimeCommand('FORCE_CLEAR', { owner_id: 'o1', names: ['x'], all: true }), {
    cmd: 'FORCE_CLEAR',
    ownerId: 'o1',
    names: ['x'],
    all: true,
  });
  assertCommandError(
    () => parseRuntimeCommand('FORCE_CLEAR', { owner_id: 'o1', all: 'yes' }),
    'payload.all must be boolean',
  );
  assertCommandError(() => parseRuntimeCommand('FORCE_CLEAR', {}), 'payload.owner_id required');
});

void test('LOAD_PROJECT validates the bundle shape and defaults meta', () => {
  assert.deepEqual(parseRuntimeCommand('LOAD_PROJECT', bundle), {
    cmd: 'LOAD_PROJECT',
    bundle: { ...bundle, meta: {} },
  });
  assertCommandError(
    () => parseRuntimeCommand('LOAD_PROJECT', { ...bundle, project: [] }),
    'payload.project must be object',
  );
  assertCommandError(
    () => parseRuntimeCommand('LOAD_PROJECT', { project: {}, pages: {}, sources: {} }),
    'payload.vars must be object',
  );
  assertCommandError(
    () => parseRuntimeCommand('LOAD_PROJECT', { ...bundle, sources: { 'a.st': 1 } }),
    'payload.sources values must be strings',
  );
  assertCommandError(
    () => parseRuntimeCommand('LOAD_PROJECT', { ...bundle, sources: { '': 'x' } }),
    'payload.sources keys must be non-empty strings',
  );
});
