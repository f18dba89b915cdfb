import type { Command } from 'commander';
import { parseAgentId } from '../../shared/identity.js';
import { heartbeatKey } from '../../supervisor/pid-store.js';
import { createContext } from '../context.js';

export function registerStop(program: Command): void {
  program
    .command('stop <agentId>')
    .description("Stop an agent's heartbeat and clear its pid record")
    .action((rawId: string) => {
      const agentId = parseAgentId(rawId);
      const ctx = createContext();
      const pid = ctx.store.terminateAndClear(heartbeatKey(agentId));
      if (pid === null) {
        console.log(`No heartbeat recorded for ${agentId}`);
      } else {
        console.log(`Heartbeat for ${agentId} stopped (pid ${pid}).`);
      }
    });
}
