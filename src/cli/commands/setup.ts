import type { Command } from 'commander';
import { DependencyMissingError } from '../../shared/errors.js';
import { parseIdentity } from '../../shared/identity.js';
import { SetupOrchestrator } from '../../supervisor/setup.js';
import { createContext, stopHeartbeatsOnExit } from '../context.js';
import { promptIdentity } from '../prompt.js';

interface SetupFlags {
  id?: string;
  kind?: string;
  description?: string;
  monitor: boolean;
  heartbeat: boolean;
}

export function registerSetup(program: Command): void {
  program
    .command('setup')
    .description('Prepare the shared workspace, register an agent and start supervision')
    .option('--id <id>', 'Agent ID')
    .option('--kind <kind>', 'Agent type (e.g. llm, coding, research)')
    .option('--description <text>', 'Short agent description')
    .option('--no-monitor', 'Do not start the event and status monitors')
    .option('--no-heartbeat', 'Do not keep a heartbeat running after setup')
    .action(async (opts: SetupFlags) => {
      const ctx = createContext();
      const orchestrator = new SetupOrchestrator({
        cwd: ctx.cwd,
        scriptsDir: ctx.config.scriptsDir,
        platform: ctx.platform,
        probe: ctx.probe,
        logger: ctx.logger,
        toolkit: ctx.toolkit,
        supervisor: ctx.supervisor,
        heartbeat: ctx.heartbeat,
      });

      try {
        const result = await orchestrator.run({
          identity: async () => parseIdentity(await promptIdentity(opts)),
          monitor: opts.monitor,
          heartbeat: opts.heartbeat,
          beforeHeartbeat: () => stopHeartbeatsOnExit(ctx),
        });
        if (result.heartbeat) {
          ctx.logger.info(`Heartbeat for ${result.identity.id} is running. Press Ctrl-C to stop.`);
        }
      } catch (err) {
        if (err instanceof DependencyMissingError) {
          ctx.logger.error(err.message);
          for (const line of err.instructions) ctx.logger.info(line);
          ctx.logger.error('Setup cannot continue without required dependencies.');
          ctx.logger.info('Please install them manually and run this command again.');
          process.exit(1);
        }
        throw err;
      }
    });
}
