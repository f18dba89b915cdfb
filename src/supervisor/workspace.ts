import { chmodSync, existsSync, mkdirSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { Platform } from '../shared/types.js';
import { archivePath, communicationPath, eventsLogPath, logsDir, statusFilePath } from '../shared/paths.js';

export function ensureDirectories(cwd: string): void {
  mkdirSync(logsDir(cwd), { recursive: true });
}

/** Creates the shared files agents coordinate through. Existing files are left alone. */
export function initializeFiles(cwd: string, now: Date = new Date()): string[] {
  const seeds: Array<[string, string]> = [
    [eventsLogPath(cwd), ''],
    [statusFilePath(cwd), JSON.stringify({ updated_at: now.toISOString(), agents: {} }, null, 2) + '\n'],
    [communicationPath(cwd), '# Communication Log\n'],
    [archivePath(cwd), '# Archived Communications\n'],
  ];

  const created: string[] = [];
  for (const [filePath, content] of seeds) {
    if (existsSync(filePath)) continue;
    writeFileSync(filePath, content, 'utf-8');
    created.push(filePath);
  }
  return created;
}

/** chmod 755 on every shell script; Windows runs them through a shell instead. */
export function makeScriptsExecutable(scriptsDir: string, platform: Platform): string[] {
  if (platform === 'win32') return [];

  let entries: string[];
  try {
    entries = readdirSync(scriptsDir);
  } catch {
    return [];
  }

  const changed: string[] = [];
  for (const entry of entries.sort()) {
    if (!entry.endsWith('.sh')) continue;
    const filePath = join(scriptsDir, entry);
    chmodSync(filePath, 0o755);
    changed.push(filePath);
  }
  return changed;
}
