#!/usr/bin/env node
import { Command } from 'commander';
import { registerSetup } from './commands/setup.js';
import { registerHeartbeat } from './commands/heartbeat.js';
import { registerStop } from './commands/stop.js';
import { registerMonitor } from './commands/monitor.js';
import { registerStatus } from './commands/status.js';
import { registerReference } from './commands/reference.js';

const program = new Command();

program
  .name('nexus')
  .description('Heartbeat and monitor supervision for agents sharing a workspace')
  .version('0.1.0');

registerSetup(program);
registerHeartbeat(program);
registerStop(program);
registerMonitor(program);
registerStatus(program);
registerReference(program);

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(err.message);
  process.exit(1);
});
