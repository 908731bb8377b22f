import assert from 'node:assert/strict';
import test from 'node:test';
import { CommandError, LocalSimRuntime, RUNTIME_CAPABILITIES } from '../src/runtime/runtime-state.ts';

const bundle = {
  project: { name: 'Demo' },
  pages: {},
  vars: {},
  sources: { 'a.st': 'x' },
  meta: {},
};

function createRuntime(): { runtime: LocalSimRuntime; advance: (ms: number) => void } {
  let nowMs = 1000;
  const runtime = new LocalSimRuntime({
    monotonicNowMs: () => nowMs,
    wallClockNow: () => new Date(Date.UTC(2024, 4, 6, 7, 8, 9, 500)),
  });
  return {
    runtime,
    advance: (ms: number) => {
      nowMs += ms;
    },
  };
}

void test('runtime starts in STOP with no project and reports uptime from its own clock', () => {
  const { runtime, advance } = createRuntime();
  advance(12.7);
  assert.deepEqual(runtime.ping(), {
    resp: 'PONG',
    runtime_state: 'STOP',
    uptime_ms: 12,
    project_loaded: false,
    caps: [...RUNTIME_CAPABILITIES],
  });
  assert.deepEqual(runtime.status(), {
    runtime_state: 'STOP',
    last_error: '',
    effective_scan_ms: 10,
    round_time_ms: 0,
    uptime_ms: 12,
    project_loaded: false,
    project_info: {},
  });
  assert.deepEqual(runtime.diagnostics(), {
    runtime_state: 'STOP',
    round_time_ms: 0,
    effective_scan_ms: 10,
    boards: [],
  });
});

void test('START requires a loaded project', () => {
  const { runtime } = createRuntime();
  assert.throws(
    () => runtime.start(),
    new CommandError('No project loaded. Use LOAD_PROJECT first.'),
  );
  assert.equal(runtime.lifecycleState(), 'STOP');
});

void test('loading a project summarizes it and drops RUN back to STOP', () => {
  const { runtime } = createRuntime();
  runtime.loadProject(bundle);
  assert.equal(runtime.start(), 'RUN');
  assert.equal(runtime.start(), 'RUN');

  const summary = runtime.loadProject(bundle);
  assert.deepEqual(summary, {
    name: 'Demo',
    pages: 0,
    sheets: 0,
    files: 1,
    st_files: 1,
    bytes: 1,
    received_utc: '2024-05-06T07:08:09Z',
  });
  assert.equal(runtime.lifecycleState(), 'STOP');
  assert.equal(runtime.projectLoaded(), true);
  assert.equal(runtime.loadedBundle()?.received_utc, '2024-05-06T07:08:09Z');
  assert.deepEqual(runtime.status().project_info, summary);
});

void test('STOP is idempotent', () => {
  const { runtime } = createRuntime();
  assert.equal(runtime.stop(), 'STOP');
  runtime.loadProject(bundle);
  runtime.start();
  assert.equal(runtime.stop(), 'STOP');
  assert.equal(runtime.stop(), 'STOP');
});

void test('START is refused in ERROR until STOP leaves it', () => {
  const { runtime } = createRuntime();
  runtime.loadProject(bundle);
  runtime.fault('board 3 missing');

  assert.throws(() => runtime.start(), new CommandError('Runtime in ERROR: STOP then clear error'));
  assert.equal(runtime.lifecycleState(), 'ERROR');
  assert.equal(runtime.stop(), 'STOP');
  assert.equal(runtime.status().last_error, 'board 3 missing');
  assert.equal(runtime.start(), 'RUN');
});

void test('LOAD_PROJECT returns a faulted runtime to STOP', () => {
  const { runtime } = createRuntime();
  runtime.fault('board 3 missing');
  runtime.loadProject(bundle);
  assert.equal(runtime.lifecycleState(), 'STOP');
  assert.equal(runtime.start(), 'RUN');
});

void test('variables read back stored values with forces layered on top', () => {
  const { runtime } = createRuntime();
  assert.equal(runtime.setVars({ x: 1, y: 'on' }), 2);
  runtime.forces.set('o1', 'connection-a', { x: 5 });

  assert.deepEqual(runtime.readVars(['x', 'y', 'missing']), { x: 5, y: 'on', missing: null });

  runtime.forces.clear('o1');
  assert.deepEqual(runtime.readVars(['x']), { x: 1 });
  assert.deepEqual(runtime.readVars([]), {});
});

void test('SET_VARS does not disturb an active force', () => {
  const { runtime } = createRuntime();
  runtime.forces.set('o1', 'connection-a', { x: 5 });
  assert.equal(runtime.setVars({ x: 9 }), 1);
  assert.deepEqual(runtime.readVars(['x']), { x: 5 });
  runtime.forces.clearByConnection('connection-a');
  assert.deepEqual(runtime.readVars(['x']), { x: 9 });
});
