import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../shared/log.js';
import type { RunResult } from './exec.js';
import { heartbeatKey, type PidFileStore } from './pid-store.js';

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 60_000;

export type Wait = (ms: number, signal: AbortSignal) => Promise<void>;

export interface HeartbeatReporter {
  reportHeartbeat(agentId: string): Promise<RunResult>;
}

export interface HeartbeatHandle {
  readonly agentId: string;
  /** Settles once the loop has exited after a stop. */
  readonly done: Promise<void>;
  stop(): void;
}

export interface HeartbeatSchedulerOpts {
  store: PidFileStore;
  reporter: HeartbeatReporter;
  intervalMs?: number;
  /** Pid written to the record; the process hosting the loop. */
  pid?: number;
  logger?: Logger;
  wait?: Wait;
}

interface HeartbeatTask {
  controller: AbortController;
  done: Promise<void>;
}

const abortableSleep: Wait = async (ms, signal) => {
  await sleep(ms, undefined, { signal });
};

/**
 * Keeps one proof-of-life loop per agent id. A loop reports, waits the
 * interval, and repeats until stopped; a failed report never ends it.
 */
export class HeartbeatScheduler {
  private readonly tasks = new Map<string, HeartbeatTask>();
  private readonly intervalMs: number;
  private readonly pid: number;
  private readonly wait: Wait;

  constructor(private readonly opts: HeartbeatSchedulerOpts) {
    this.intervalMs = opts.intervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.pid = opts.pid ?? process.pid;
    this.wait = opts.wait ?? abortableSleep;
  }

  start(agentId: string): HeartbeatHandle {
    const key = heartbeatKey(agentId);

    this.stop(agentId);
    const previous = this.opts.store.terminateAndClear(key);
    if (previous !== null && previous !== this.pid) {
      this.opts.logger?.info(`Replaced heartbeat for ${agentId} held by pid ${previous}`);
    }
    this.opts.store.write(key, this.pid);

    const controller = new AbortController();
    const done = this.loop(agentId, controller.signal).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      this.opts.logger?.error(`Heartbeat loop for ${agentId} ended unexpectedly: ${message}`);
    });
    const task: HeartbeatTask = { controller, done };
    this.tasks.set(agentId, task);

    return {
      agentId,
      done,
      stop: () => {
        if (this.tasks.get(agentId) === task) this.stop(agentId);
      },
    };
  }

  /** Cancels the loop for `agentId` and drops its record if it still names this process. */
  stop(agentId: string): boolean {
    const task = this.tasks.get(agentId);
    if (!task) return false;

    task.controller.abort();
    this.tasks.delete(agentId);

    const key = heartbeatKey(agentId);
    if (this.opts.store.read(key) === this.pid) {
      this.opts.store.remove(key);
    }
    return true;
  }

  stopAll(): string[] {
    const stopped = [...this.tasks.keys()];
    for (const agentId of stopped) this.stop(agentId);
    return stopped;
  }

  isRunning(agentId: string): boolean {
    return this.tasks.has(agentId);
  }

  running(): string[] {
    return [...this.tasks.keys()];
  }

  private async loop(agentId: string, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.beat(agentId);
      if (signal.aborted) return;
      try {
        await this.wait(this.intervalMs, signal);
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }
    }
  }

  private async beat(agentId: string): Promise<void> {
    try {
      const result = await this.opts.reporter.reportHeartbeat(agentId);
      if (result.exitCode !== 0) {
        this.opts.logger?.debug(`Heartbeat for ${agentId} exited with code ${result.exitCode}`);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.opts.logger?.debug(`Heartbeat for ${agentId} failed: ${message}`);
    }
  }
}
