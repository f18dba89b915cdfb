import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  BackgroundLauncher,
  MultiplexerLauncher,
  WindowsConsoleLauncher,
  createLauncher,
  selectLaunchStrategy,
} from '../supervisor/launcher.js';
import { ScreenMultiplexer, TmuxMultiplexer, shellQuote } from '../supervisor/multiplexer.js';
import type { CommandRunner, RunResult } from '../supervisor/exec.js';
import { FakeSystem } from './helpers/fake-system.js';

function probe(...tools: string[]): FakeSystem {
  return new FakeSystem(tools);
}

/** Runner that answers every capture with a fixed string and records the calls. */
class CannedRunner implements CommandRunner {
  readonly captured: Array<{ command: string; args: string[]; anyExit: boolean }> = [];

  constructor(private readonly output: string | null) {}

  async run(): Promise<RunResult> {
    return { exitCode: 0, stdout: '' };
  }

  capture(command: string, args: string[], opts: { anyExit?: boolean } = {}): string | null {
    this.captured.push({ command, args, anyExit: opts.anyExit ?? false });
    return this.output;
  }

  spawnDetached(): number | null {
    return null;
  }
}

// ---------------------------------------------------------------------------
// selectLaunchStrategy
// ---------------------------------------------------------------------------
describe('selectLaunchStrategy', () => {
  it('prefers screen when it is installed', () => {
    assert.equal(selectLaunchStrategy('linux', probe('screen', 'tmux')), 'screen');
    assert.equal(selectLaunchStrategy('linux', probe('screen')), 'screen');
    assert.equal(selectLaunchStrategy('darwin', probe('screen', 'tmux')), 'screen');
  });

  it('falls back to tmux without screen', () => {
    assert.equal(selectLaunchStrategy('linux', probe('tmux')), 'tmux');
    assert.equal(selectLaunchStrategy('darwin', probe('tmux')), 'tmux');
  });

  it('falls back to a background process without a multiplexer', () => {
    assert.equal(selectLaunchStrategy('linux', probe()), 'background');
    assert.equal(selectLaunchStrategy('darwin', probe('jq')), 'background');
  });

  it('lets a tmux preference win over screen', () => {
    assert.equal(selectLaunchStrategy('linux', probe('screen', 'tmux'), 'tmux'), 'tmux');
    assert.equal(selectLaunchStrategy('linux', probe('screen'), 'tmux'), 'screen');
  });

  it('never picks a multiplexer when told not to', () => {
    assert.equal(selectLaunchStrategy('linux', probe('screen', 'tmux'), 'none'), 'background');
  });

  it('opens a console window on Windows or gives up', () => {
    assert.equal(selectLaunchStrategy('win32', probe('cmd', 'screen')), 'windows-console');
    assert.equal(selectLaunchStrategy('win32', probe('screen', 'tmux')), null);
  });

  it('gives the same answer for the same tools', () => {
    const tools = probe('tmux');
    const first = selectLaunchStrategy('linux', tools);
    assert.equal(selectLaunchStrategy('linux', tools), first);
  });
});

// ---------------------------------------------------------------------------
// ScreenMultiplexer
// ---------------------------------------------------------------------------
describe('ScreenMultiplexer', () => {
  it('reads session pids from screen -ls, ignoring longer names', () => {
    const runner = new CannedRunner([
      'There are screens on:',
      '\t12345.event_monitor\t(10/19/2026 10:00:00 AM)\t(Detached)',
      '\t12399.event_monitor_old\t(Detached)',
      '\t12400.agent_monitor\t(Detached)',
      '3 Sockets in /run/screen/S-dev.',
    ].join('\n'));
    const screen = new ScreenMultiplexer(runner);

    assert.deepStrictEqual(screen.sessionPids('event_monitor'), [12345]);
    assert.deepStrictEqual(runner.captured[0], { command: 'screen', args: ['-ls', 'event_monitor'], anyExit: true });
  });

  it('kills every session sharing a name', () => {
    const fake = new FakeSystem(['screen']);
    const screen = new ScreenMultiplexer(fake);
    screen.newSession('event_monitor', '/w/scripts/watch_events.sh', []);
    screen.newSession('event_monitor', '/w/scripts/watch_events.sh', []);
    assert.equal(fake.sessions('screen', 'event_monitor').length, 2);

    screen.killSession('event_monitor');
    assert.equal(fake.sessions('screen', 'event_monitor').length, 0);
  });
});

// ---------------------------------------------------------------------------
// TmuxMultiplexer
// ---------------------------------------------------------------------------
describe('TmuxMultiplexer', () => {
  it('passes the command as one quoted shell line', () => {
    const runner = new CannedRunner('');
    const tmux = new TmuxMultiplexer(runner);

    assert.equal(tmux.newSession('agent_monitor', 'watch', ['-n', '10', '/w/scripts/agent_status.sh', 'list']), true);
    assert.deepStrictEqual(runner.captured[0]?.args, [
      'new-session', '-d', '-s', 'agent_monitor',
      "'watch' '-n' '10' '/w/scripts/agent_status.sh' 'list'",
    ]);
  });

  it('quotes embedded single quotes', () => {
    assert.equal(shellQuote("it's"), "'it'\\''s'");
  });

  it('reports a refused session', () => {
    const tmux = new TmuxMultiplexer(new CannedRunner(null));
    assert.equal(tmux.newSession('event_monitor', 'x', []), false);
    assert.deepStrictEqual(tmux.sessionPids('event_monitor'), []);
  });

  it('addresses sessions by exact name', () => {
    const runner = new CannedRunner('777\n');
    const tmux = new TmuxMultiplexer(runner);

    assert.deepStrictEqual(tmux.sessionPids('event_monitor'), [777]);
    tmux.killSession('event_monitor');
    assert.deepStrictEqual(runner.captured.map(c => c.args), [
      ['list-panes', '-t', '=event_monitor', '-F', '#{pane_pid}'],
      ['kill-session', '-t', '=event_monitor'],
    ]);
  });
});

// ---------------------------------------------------------------------------
// launchers
// ---------------------------------------------------------------------------
describe('MultiplexerLauncher', () => {
  it('returns the session name and the hosted pid', () => {
    const fake = new FakeSystem(['tmux']);
    const launcher = new MultiplexerLauncher(new TmuxMultiplexer(fake));

    const handle = launcher.launch({ name: 'event_monitor', command: '/w/scripts/watch_events.sh', args: [] });
    assert.deepStrictEqual(handle, { strategy: 'tmux', name: 'event_monitor', session: 'event_monitor', pid: 1000 });
  });

  it('throws when the multiplexer refuses', () => {
    const fake = new FakeSystem(['tmux']);
    const launcher = new MultiplexerLauncher(new TmuxMultiplexer(fake));
    launcher.launch({ name: 'event_monitor', command: 'a', args: [] });

    assert.throws(
      () => launcher.launch({ name: 'event_monitor', command: 'a', args: [] }),
      /tmux refused to start session event_monitor/,
    );
  });
});

describe('BackgroundLauncher', () => {
  it('starts a detached process and returns its pid', () => {
    const fake = new FakeSystem();
    const launcher = new BackgroundLauncher(fake, '/w');

    const handle = launcher.launch({ name: 'event_monitor', command: '/w/scripts/watch_events.sh', args: [] });
    assert.deepStrictEqual(handle, { strategy: 'background', name: 'event_monitor', pid: 1000 });
    assert.deepStrictEqual(fake.detached, [{ command: '/w/scripts/watch_events.sh', args: [] }]);
  });

  it('throws when nothing started', () => {
    const fake = new FakeSystem();
    fake.failSpawn = true;
    const launcher = new BackgroundLauncher(fake, '/w');

    assert.throws(
      () => launcher.launch({ name: 'event_monitor', command: '/w/scripts/watch_events.sh', args: [] }),
      /Failed to start \/w\/scripts\/watch_events\.sh/,
    );
  });
});

describe('WindowsConsoleLauncher', () => {
  it('opens the command in a new console window', () => {
    const fake = new FakeSystem(['cmd']);
    const launcher = new WindowsConsoleLauncher(fake, 'C:\\work');

    const handle = launcher.launch({ name: 'event_monitor', command: 'bash.exe', args: ['scripts/watch_events.sh'] });
    assert.deepStrictEqual(handle, { strategy: 'windows-console', name: 'event_monitor', pid: null });
    assert.deepStrictEqual(fake.detached, [
      { command: 'cmd.exe', args: ['/c', 'start', '', 'bash.exe', 'scripts/watch_events.sh'] },
    ]);
  });

  it('throws when cmd.exe could not be started', () => {
    const fake = new FakeSystem(['cmd']);
    fake.failSpawn = true;
    const launcher = new WindowsConsoleLauncher(fake, 'C:\\work');

    assert.throws(
      () => launcher.launch({ name: 'event_monitor', command: 'bash.exe', args: [] }),
      /Failed to open a console window/,
    );
  });
});

describe('createLauncher', () => {
  it('builds a launcher for each strategy', () => {
    const deps = { runner: new FakeSystem(), cwd: '/w' };
    assert.equal(createLauncher('screen', deps).strategy, 'screen');
    assert.equal(createLauncher('tmux', deps).strategy, 'tmux');
    assert.equal(createLauncher('background', deps).strategy, 'background');
    assert.equal(createLauncher('windows-console', deps).strategy, 'windows-console');
  });
});
