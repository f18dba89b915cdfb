import type { Command } from 'commander';
import { parseAgentId } from '../../shared/identity.js';
import { createContext, stopHeartbeatsOnExit } from '../context.js';

function parseInterval(raw: string): number {
  const seconds = Number(raw);
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new Error(`Invalid interval: ${raw} (expected a positive number of seconds)`);
  }
  return seconds;
}

export function registerHeartbeat(program: Command): void {
  program
    .command('heartbeat <agentId>')
    .description('Report liveness for an agent on a fixed interval until interrupted')
    .option('-i, --interval <seconds>', 'Seconds between reports (defaults to config)')
    .action((rawId: string, opts: { interval?: string }) => {
      const agentId = parseAgentId(rawId);
      const overrides = opts.interval === undefined ? {} : { heartbeatIntervalSeconds: parseInterval(opts.interval) };
      const ctx = createContext(process.cwd(), overrides);

      ctx.heartbeat.start(agentId);
      stopHeartbeatsOnExit(ctx);
      ctx.logger.info(
        `Heartbeat for ${agentId} every ${ctx.config.heartbeatIntervalSeconds}s (pid ${process.pid}). Press Ctrl-C to stop.`,
      );
    });
}
