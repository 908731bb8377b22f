import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import test from 'node:test';
import {
  parseAssignments,
  readBundleFile,
  resolveControlTarget,
  runControlCommand,
} from '../src/cli/control.ts';
import {
  CapturedLogSink,
  SAMPLE_BUNDLE,
  startQuietServer,
} from './control-plane-runtime-server-test-helpers.ts';

void test('parseAssignments keeps json types and falls back to strings', () => {
  assert.deepEqual(parseAssignments(['speed=3', 'on=true', 'label=belt A', 'blank=', 'list=[1,2]']), {
    speed: 3,
    on: true,
    label: 'belt A',
    blank: '',
    list: [1, 2],
  });
  assert.throws(() => parseAssignments(['=3']), /invalid assignment: =3/);
  assert.throws(() => parseAssignments(['speed']), /invalid assignment: speed/);
});

void test('readBundleFile requires a json object', () => {
  const dir = mkdtempSync(join(tmpdir(), 'localsim-bundle-'));
  try {
    const bundlePath = join(dir, 'bundle.json');
    writeFileSync(bundlePath, JSON.stringify(SAMPLE_BUNDLE));
    assert.deepEqual(readBundleFile(bundlePath), SAMPLE_BUNDLE);

    const listPath = join(dir, 'list.json');
    writeFileSync(listPath, '[]');
    assert.throws(() => readBundleFile(listPath), /bundle file must contain a JSON object/);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

void test('resolveControlTarget prefers flags over environment', () => {
  assert.deepEqual(
    resolveControlTarget({
      configPath: join(tmpdir(), 'localsim-missing-config.jsonc'),
      env: { LOCALSIM_HOST: '10.0.0.2', LOCALSIM_PORT: '4000' },
    }),
    { host: '10.0.0.2', port: 4000 },
  );
  assert.deepEqual(
    resolveControlTarget({
      port: 4001,
      configPath: join(tmpdir(), 'localsim-missing-config.jsonc'),
      env: { LOCALSIM_PORT: '4000' },
    }),
    { host: '127.0.0.1', port: 4001 },
  );
});

void test('runControlCommand prints the response and maps ok to the exit code', async () => {
  const server = await startQuietServer();
  const target = { host: '127.0.0.1', port: server.address().port };
  const stdout = new CapturedLogSink();
  const stderr = new CapturedLogSink();
  try {
    assert.equal(await runControlCommand(target, 'START', {}, { stdout, stderr }), 1);
    assert.deepEqual(JSON.parse(stdout.text()), {
      ok: false,
      req_id: 1,
      payload: {},
      error: 'No project loaded. Use LOAD_PROJECT first.',
    });

    stdout.lines.length = 0;
    assert.equal(
      await runControlCommand(target, 'SET_VARS', { values: { x: 2 } }, { stdout, stderr }),
      0,
    );
    assert.deepEqual(JSON.parse(stdout.text()), {
      ok: true,
      req_id: 1,
      payload: { count: 1 },
      error: '',
    });
    assert.equal(stderr.lines.length, 0);
  } finally {
    await server.close();
  }
});

void test('runControlCommand reports connection failures on stderr', async () => {
  const server = await startQuietServer();
  const port = server.address().port;
  await server.close();

  const stdout = new CapturedLogSink();
  const stderr = new CapturedLogSink();
  const code = await runControlCommand({ host: '127.0.0.1', port }, 'PING', {}, { stdout, stderr });
  assert.equal(code, 1);
  assert.equal(stdout.lines.length, 0);
  assert.equal(stderr.text().startsWith(`failed to connect to 127.0.0.1:${String(port)}: `), true);
});
