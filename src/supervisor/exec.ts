import { execFileSync, spawn } from 'node:child_process';
import { accessSync, constants, statSync } from 'node:fs';
import { delimiter, join } from 'node:path';
import type { Platform } from '../shared/types.js';

// Homebrew and /usr/local are missing from PATH when launched by some process managers
export const EXEC_ENV: NodeJS.ProcessEnv = {
  ...process.env,
  PATH: process.platform === 'win32'
    ? process.env['PATH']
    : `/opt/homebrew/bin:/usr/local/bin:${process.env['PATH'] ?? '/usr/bin:/bin'}`,
};

export function detectPlatform(platform: NodeJS.Platform = process.platform): Platform {
  if (platform === 'win32' || platform === 'darwin') return platform;
  return 'linux';
}

/** Shell scripts run directly on Unix and through bash.exe (or sh.exe) on Windows. */
export function scriptCommand(
  platform: Platform,
  probe: ToolProbe,
  script: string,
  args: string[] = [],
): { command: string; args: string[] } {
  if (platform !== 'win32') return { command: script, args };
  const shell = probe.has('bash') ? 'bash.exe' : 'sh.exe';
  return { command: shell, args: [script, ...args] };
}

export type OutputMode = 'inherit' | 'ignore' | 'pipe';

export interface RunOpts {
  cwd?: string;
  output?: OutputMode;
}

export interface RunResult {
  exitCode: number;
  stdout: string;
}

export interface CommandRunner {
  /** Resolves with the exit status; rejects only if the command could not be started. */
  run(command: string, args: string[], opts?: RunOpts): Promise<RunResult>;
  /**
   * Short synchronous probe. Returns trimmed stdout, or null on failure. With
   * `anyExit`, stdout of a non-zero exit is still returned.
   */
  capture(command: string, args: string[], opts?: { anyExit?: boolean }): string | null;
  /** Starts a process that outlives this one. Returns its pid when known. */
  spawnDetached(command: string, args: string[], opts?: { cwd?: string }): number | null;
}

export interface ToolProbe {
  has(tool: string): boolean;
}

export class SystemRunner implements CommandRunner {
  run(command: string, args: string[], opts: RunOpts = {}): Promise<RunResult> {
    const output = opts.output ?? 'inherit';
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: opts.cwd,
        env: EXEC_ENV,
        stdio: ['ignore', output, output === 'pipe' ? 'ignore' : output],
      });

      let stdout = '';
      child.stdout?.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });

      child.on('error', err => reject(err));
      child.on('close', code => resolve({ exitCode: code ?? -1, stdout }));
    });
  }

  capture(command: string, args: string[], opts: { anyExit?: boolean } = {}): string | null {
    try {
      return execFileSync(command, args, {
        encoding: 'utf-8',
        env: EXEC_ENV,
        stdio: ['ignore', 'pipe', 'ignore'],
      }).trim();
    } catch (err) {
      if (opts.anyExit && typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
        && 'stdout' in err && typeof err.stdout === 'string') {
        return err.stdout.trim();
      }
      return null;
    }
  }

  spawnDetached(command: string, args: string[], opts: { cwd?: string } = {}): number | null {
    const child = spawn(command, args, {
      cwd: opts.cwd,
      env: EXEC_ENV,
      detached: true,
      stdio: 'ignore',
      windowsHide: false,
    });
    // Surface nothing: a failed start shows up later as a dead pid
    child.on('error', () => undefined);
    child.unref();
    return child.pid ?? null;
  }
}

function isExecutable(filePath: string, platform: NodeJS.Platform): boolean {
  try {
    if (!statSync(filePath).isFile()) return false;
    if (platform !== 'win32') accessSync(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Looks tools up on PATH once and remembers the answer. */
export class PathProbe implements ToolProbe {
  private readonly cache = new Map<string, boolean>();

  constructor(
    private readonly env: NodeJS.ProcessEnv = EXEC_ENV,
    private readonly platform: NodeJS.Platform = process.platform,
  ) {}

  has(tool: string): boolean {
    const cached = this.cache.get(tool);
    if (cached !== undefined) return cached;
    const found = this.lookup(tool);
    this.cache.set(tool, found);
    return found;
  }

  private lookup(tool: string): boolean {
    const dirs = (this.env['PATH'] ?? '').split(delimiter).filter(Boolean);
    const extensions = this.platform === 'win32'
      ? ['', ...(this.env['PATHEXT'] ?? '.EXE;.CMD;.BAT').split(';').map(ext => ext.toLowerCase())]
      : [''];
    for (const dir of dirs) {
      for (const ext of extensions) {
        if (isExecutable(join(dir, tool + ext), this.platform)) return true;
      }
    }
    return false;
  }
}
