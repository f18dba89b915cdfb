import { mkdirSync, readdirSync, readFileSync, unlinkSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { MonitorName, PidRecord } from '../shared/types.js';
import type { Logger } from '../shared/log.js';
import type { ProcessControl, SignalOpts } from './signals.js';

const PID_SUFFIX = '.pid';

export function heartbeatKey(agentId: string): string {
  return `heartbeat/${agentId}`;
}

export function monitorKey(name: MonitorName): string {
  return `monitor/${name}`;
}

/**
 * Maps an owner key to a file name. `[A-Za-z0-9_-]` pass through, every other
 * UTF-8 byte becomes `%XX`, so distinct keys never share a file and no key can
 * escape the run directory.
 */
export function encodeOwnerKey(ownerKey: string): string {
  let out = '';
  for (const byte of Buffer.from(ownerKey, 'utf-8')) {
    const ch = String.fromCharCode(byte);
    out += /[A-Za-z0-9_-]/.test(ch) ? ch : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return out;
}

export function decodeOwnerKey(fileStem: string): string {
  return decodeURIComponent(fileStem);
}

function parsePid(content: string): number | null {
  const text = content.trim();
  if (!/^\d+$/.test(text)) return null;
  const pid = parseInt(text, 10);
  return Number.isSafeInteger(pid) && pid > 0 ? pid : null;
}

export interface PidFileStore {
  write(ownerKey: string, pid: number): void;
  read(ownerKey: string): number | null;
  remove(ownerKey: string): void;
  /** Signals the recorded process (never this one) and removes the record. Returns the recorded pid. */
  terminateAndClear(ownerKey: string, opts?: SignalOpts): number | null;
  list(): PidRecord[];
}

export class FilePidStore implements PidFileStore {
  constructor(
    private readonly dir: string,
    private readonly processes: ProcessControl,
    private readonly logger?: Logger,
  ) {}

  pathFor(ownerKey: string): string {
    if (ownerKey.length === 0) throw new Error('Owner key must not be empty');
    return join(this.dir, encodeOwnerKey(ownerKey) + PID_SUFFIX);
  }

  write(ownerKey: string, pid: number): void {
    mkdirSync(this.dir, { recursive: true });
    writeFileSync(this.pathFor(ownerKey), `${pid}\n`, 'utf-8');
  }

  read(ownerKey: string): number | null {
    try {
      return parsePid(readFileSync(this.pathFor(ownerKey), 'utf-8'));
    } catch {
      return null;
    }
  }

  remove(ownerKey: string): void {
    try {
      unlinkSync(this.pathFor(ownerKey));
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
        const message = err instanceof Error ? err.message : String(err);
        this.logger?.debug(`Could not remove pid record ${ownerKey}: ${message}`);
      }
    }
  }

  terminateAndClear(ownerKey: string, opts: SignalOpts = {}): number | null {
    const pid = this.read(ownerKey);
    if (pid !== null && pid !== this.processes.selfPid) {
      if (!this.processes.signal(pid, 'SIGTERM', opts)) {
        this.logger?.debug(`Process ${pid} for ${ownerKey} was already gone`);
      }
    }
    this.remove(ownerKey);
    return pid;
  }

  list(): PidRecord[] {
    let entries: string[];
    try {
      entries = readdirSync(this.dir);
    } catch {
      return [];
    }

    const records: PidRecord[] = [];
    for (const entry of entries.sort()) {
      if (!entry.endsWith(PID_SUFFIX)) continue;
      let ownerKey: string;
      try {
        ownerKey = decodeOwnerKey(entry.slice(0, -PID_SUFFIX.length));
      } catch {
        continue;
      }
      const pid = this.read(ownerKey);
      if (pid !== null) records.push({ ownerKey, pid });
    }
    return records;
  }
}
