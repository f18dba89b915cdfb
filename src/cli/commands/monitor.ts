import type { Command } from 'commander';
import { createContext } from '../context.js';

const GREEN = '\x1b[32m';
const GRAY = '\x1b[90m';
const RESET = '\x1b[0m';

export function registerMonitor(program: Command): void {
  const monitor = program
    .command('monitor')
    .description('Manage the event watcher and status poller');

  monitor
    .command('start')
    .description('Replace any running monitors and start them again')
    .action(() => {
      const ctx = createContext();
      const report = ctx.supervisor.start();
      for (const handle of report.launched) {
        const where = 'session' in handle ? `${handle.strategy} session ${handle.session}` : handle.strategy;
        console.log(`  ${handle.name}: ${where}${handle.pid !== null ? ` (pid ${handle.pid})` : ''}`);
      }
      if (report.strategy !== null && report.launched.length === 0) process.exit(1);
    });

  monitor
    .command('stop')
    .description('Stop the monitors started by an earlier run')
    .action(() => {
      const ctx = createContext();
      const stopped = ctx.supervisor.stop();
      console.log(stopped.length > 0 ? `Stopped ${stopped.length} monitor(s).` : 'No monitors recorded.');
    });

  monitor
    .command('status')
    .description('Show recorded monitors and whether they are alive')
    .action(() => {
      const ctx = createContext();
      for (const entry of ctx.supervisor.status()) {
        const state = entry.pid === null
          ? `${GRAY}not recorded${RESET}`
          : entry.alive ? `${GREEN}running${RESET} (pid ${entry.pid})` : `${GRAY}dead${RESET} (pid ${entry.pid})`;
        console.log(`  ${entry.name.padEnd(14)} ${state}`);
      }
    });
}
