import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { spawn } from 'node:child_process';
import { once } from 'node:events';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FilePidStore, encodeOwnerKey, heartbeatKey, monitorKey } from '../supervisor/pid-store.js';
import { SystemProcessControl } from '../supervisor/signals.js';
import { SystemRunner } from '../supervisor/exec.js';
import { FakeSystem } from './helpers/fake-system.js';

let testDir: string;
let fake: FakeSystem;
let store: FilePidStore;

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'nexus-pid-'));
  fake = new FakeSystem();
  store = new FilePidStore(join(testDir, 'run'), fake);
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// encodeOwnerKey
// ---------------------------------------------------------------------------
describe('encodeOwnerKey', () => {
  it('keeps safe characters and escapes the rest', () => {
    assert.equal(encodeOwnerKey('heartbeat/agent7'), 'heartbeat%2Fagent7');
    assert.equal(encodeOwnerKey('monitor/event_monitor'), 'monitor%2Fevent_monitor');
    assert.equal(encodeOwnerKey('../x'), '%2E%2E%2Fx');
  });

  it('never maps two keys to the same name', () => {
    assert.notEqual(encodeOwnerKey('a/b'), encodeOwnerKey('a%2Fb'));
    assert.equal(encodeOwnerKey('a%2Fb'), 'a%252Fb');
    assert.notEqual(encodeOwnerKey('a.b'), encodeOwnerKey('a_b'));
  });

  it('escapes non-ASCII as UTF-8 bytes', () => {
    assert.equal(encodeOwnerKey('é'), '%C3%A9');
  });
});

// ---------------------------------------------------------------------------
// write / read / remove
// ---------------------------------------------------------------------------
describe('FilePidStore', () => {
  it('writes the pid as a line under the run directory', () => {
    store.write(heartbeatKey('agent7'), 1234);

    const file = join(testDir, 'run', 'heartbeat%2Fagent7.pid');
    assert.equal(readFileSync(file, 'utf-8'), '1234\n');
    assert.equal(store.read(heartbeatKey('agent7')), 1234);
  });

  it('overwrites an earlier record', () => {
    store.write('k', 1);
    store.write('k', 2);
    assert.equal(store.read('k'), 2);
  });

  it('reads a missing record as null', () => {
    assert.equal(store.read(heartbeatKey('nobody')), null);
  });

  it('reads unparsable content as null', () => {
    mkdirSync(join(testDir, 'run'), { recursive: true });
    writeFileSync(store.pathFor('garbage'), 'not-a-pid\n');
    writeFileSync(store.pathFor('zero'), '0');
    writeFileSync(store.pathFor('negative'), '-5');
    writeFileSync(store.pathFor('empty'), '');

    assert.equal(store.read('garbage'), null);
    assert.equal(store.read('zero'), null);
    assert.equal(store.read('negative'), null);
    assert.equal(store.read('empty'), null);
  });

  it('remove is a no-op for a missing record', () => {
    assert.doesNotThrow(() => store.remove('missing'));
    store.write('present', 10);
    store.remove('present');
    assert.equal(existsSync(store.pathFor('present')), false);
  });

  it('rejects an empty owner key', () => {
    assert.throws(() => store.write('', 1), /must not be empty/);
  });

  it('lists readable records in file-name order', () => {
    store.write(monitorKey('event_monitor'), 22);
    store.write(heartbeatKey('agent7'), 11);
    writeFileSync(store.pathFor('broken'), 'x');

    assert.deepStrictEqual(store.list(), [
      { ownerKey: 'heartbeat/agent7', pid: 11 },
      { ownerKey: 'monitor/event_monitor', pid: 22 },
    ]);
  });

  it('lists nothing before the run directory exists', () => {
    assert.deepStrictEqual(store.list(), []);
  });
});

// ---------------------------------------------------------------------------
// terminateAndClear
// ---------------------------------------------------------------------------
describe('terminateAndClear', () => {
  it('is a no-op without a record', () => {
    assert.equal(store.terminateAndClear(heartbeatKey('agent7')), null);
    assert.equal(store.terminateAndClear(heartbeatKey('agent7')), null);
    assert.deepStrictEqual(fake.signals, []);
  });

  it('signals the recorded process and removes the record', () => {
    const pid = fake.startProcess('nexus', ['heartbeat', 'agent7']);
    store.write(heartbeatKey('agent7'), pid);

    assert.equal(store.terminateAndClear(heartbeatKey('agent7')), pid);
    assert.deepStrictEqual(fake.signals, [{ pid, signal: 'SIGTERM' }]);
    assert.equal(fake.isAlive(pid), false);
    assert.equal(existsSync(store.pathFor(heartbeatKey('agent7'))), false);
  });

  it('removes the record even when the process is already gone', () => {
    store.write(heartbeatKey('agent7'), 31337);

    assert.equal(store.terminateAndClear(heartbeatKey('agent7')), 31337);
    assert.deepStrictEqual(fake.signals, [{ pid: 31337, signal: 'SIGTERM' }]);
    assert.equal(existsSync(store.pathFor(heartbeatKey('agent7'))), false);
  });

  it('removes an unparsable record without signalling', () => {
    mkdirSync(join(testDir, 'run'), { recursive: true });
    writeFileSync(store.pathFor(heartbeatKey('agent7')), 'garbage');

    assert.equal(store.terminateAndClear(heartbeatKey('agent7')), null);
    assert.deepStrictEqual(fake.signals, []);
    assert.deepStrictEqual(readdirSync(join(testDir, 'run')), []);
  });

  it('never signals the current process', () => {
    store.write(heartbeatKey('agent7'), fake.selfPid);

    assert.equal(store.terminateAndClear(heartbeatKey('agent7')), fake.selfPid);
    assert.deepStrictEqual(fake.signals, []);
    assert.equal(store.read(heartbeatKey('agent7')), null);
  });

  it('terminates a real child process', async () => {
    const child = spawn(process.execPath, ['-e', 'setInterval(() => {}, 1000)'], { stdio: 'ignore' });
    const exited = once(child, 'exit');
    if (child.pid === undefined) throw new Error('child did not start');

    const runner = new SystemRunner();
    const realStore = new FilePidStore(join(testDir, 'real'), new SystemProcessControl(runner));
    realStore.write(heartbeatKey('agent7'), child.pid);

    assert.equal(realStore.terminateAndClear(heartbeatKey('agent7')), child.pid);
    const [, signal] = await exited;
    assert.equal(signal, 'SIGTERM');
    assert.equal(realStore.read(heartbeatKey('agent7')), null);
  });

  it('takes down the children of a recorded group leader', { skip: process.platform === 'win32', timeout: 10_000 }, async () => {
    // The leader outlives SIGTERM until its own child has exited, so it only
    // exits if the signal reached the whole group
    const leaderScript = [
      "const { spawn } = require('node:child_process');",
      "const c = spawn(process.execPath, ['-e', 'setInterval(() => {}, 1000)'], { stdio: 'ignore' });",
      "process.on('SIGTERM', () => {});",
      'c.on(\'exit\', () => process.exit(0));',
      "process.stdout.write(String(c.pid) + '\\n');",
    ].join('\n');
    const leader = spawn(process.execPath, ['-e', leaderScript], { detached: true, stdio: ['ignore', 'pipe', 'ignore'] });
    const exited = once(leader, 'exit');
    if (leader.pid === undefined || !leader.stdout) throw new Error('leader did not start');

    const [chunk] = await once(leader.stdout, 'data');
    const childPid = parseInt(String(chunk), 10);

    const control = new SystemProcessControl(new SystemRunner());
    const realStore = new FilePidStore(join(testDir, 'real'), control);
    realStore.write(monitorKey('event_monitor'), leader.pid);

    assert.equal(realStore.terminateAndClear(monitorKey('event_monitor'), { group: true }), leader.pid);
    await exited;
    assert.equal(control.isAlive(childPid), false);
  });
});
