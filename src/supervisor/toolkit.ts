import type { AgentState, Platform } from '../shared/types.js';
import { scriptPath } from '../shared/paths.js';
import { scriptCommand, type CommandRunner, type OutputMode, type RunResult, type ToolProbe } from './exec.js';

export const SCRIPTS = {
  status: 'agent_status.sh',
  watch: 'watch_events.sh',
  logEvent: 'log_event.sh',
  snapshot: 'generate_snapshot.sh',
} as const;

export type ScriptName = (typeof SCRIPTS)[keyof typeof SCRIPTS];

export interface ToolkitOpts {
  cwd: string;
  scriptsDir: string;
  platform: Platform;
  runner: CommandRunner;
  probe: ToolProbe;
}

/**
 * The shell collaborators that own the event log and the status registry.
 * Every call is a child process run from the working directory.
 */
export class AgentToolkit {
  constructor(private readonly opts: ToolkitOpts) {}

  /** Command and arguments that run `script`, resolved for this platform. */
  command(script: ScriptName, args: string[] = []): { command: string; args: string[] } {
    const { cwd, scriptsDir, platform, probe } = this.opts;
    return scriptCommand(platform, probe, scriptPath(cwd, scriptsDir, script), args);
  }

  /** How an operator would type the command: relative to the working directory. */
  displayCommand(script: ScriptName, args: string[] = []): string {
    const { scriptsDir, platform, probe } = this.opts;
    const relative = `${scriptsDir.replace(/\\/g, '/').replace(/\/$/, '')}/${script}`;
    const { command, args: rest } = scriptCommand(platform, probe, relative, args);
    return [command, ...rest].join(' ');
  }

  reportHeartbeat(agentId: string): Promise<RunResult> {
    return this.exec(SCRIPTS.status, ['heartbeat', agentId], 'ignore');
  }

  registerAgent(id: string, kind: string, description: string): Promise<RunResult> {
    return this.exec(SCRIPTS.status, ['register', id, kind, description]);
  }

  setStatus(id: string, state: AgentState, note: string): Promise<RunResult> {
    return this.exec(SCRIPTS.status, ['status', id, state, note]);
  }

  sendMessage(from: string, to: string, message: string): Promise<RunResult> {
    return this.exec(SCRIPTS.logEvent, ['message', JSON.stringify({ from, to, message })]);
  }

  generateSnapshot(): Promise<RunResult> {
    return this.exec(SCRIPTS.snapshot, []);
  }

  private exec(script: ScriptName, args: string[], output: OutputMode = 'inherit'): Promise<RunResult> {
    const { command, args: fullArgs } = this.command(script, args);
    return this.opts.runner.run(command, fullArgs, { cwd: this.opts.cwd, output });
  }
}
