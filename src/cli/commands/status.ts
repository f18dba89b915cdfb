import type { Command } from 'commander';
import { createContext } from '../context.js';

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

export function registerStatus(program: Command): void {
  program
    .command('status')
    .description('List pid records in this workspace and whether their processes are alive')
    .action(() => {
      const ctx = createContext();
      const records = ctx.store.list();
      if (records.length === 0) {
        console.log('No supervised processes recorded');
        return;
      }
      for (const { ownerKey, pid } of records) {
        const alive = ctx.processes.isAlive(pid);
        const state = alive ? `${GREEN}alive${RESET}` : `${RED}gone${RESET}`;
        console.log(`  ${BOLD}${ownerKey}${RESET}  pid ${pid}  ${state}`);
      }
    });
}
