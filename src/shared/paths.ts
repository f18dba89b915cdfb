import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

export function globalDir(): string {
  return join(homedir(), '.nexus');
}

export function globalConfigPath(): string {
  return join(globalDir(), 'config.json');
}

export function projectDir(cwd: string): string {
  return join(cwd, '.nexus');
}

export function projectConfigPath(cwd: string): string {
  return join(projectDir(cwd), 'config.json');
}

export function runDir(cwd: string): string {
  return join(projectDir(cwd), 'run');
}

export function logsDir(cwd: string): string {
  return join(cwd, 'logs');
}

export function eventsLogPath(cwd: string): string {
  return join(cwd, 'events.log');
}

export function statusFilePath(cwd: string): string {
  return join(cwd, 'agent_status.json');
}

export function communicationPath(cwd: string): string {
  return join(cwd, 'communication.md');
}

export function archivePath(cwd: string): string {
  return join(cwd, 'archive.md');
}

export function scriptsPath(cwd: string, scriptsDir: string): string {
  return isAbsolute(scriptsDir) ? scriptsDir : resolve(cwd, scriptsDir);
}

export function scriptPath(cwd: string, scriptsDir: string, name: string): string {
  return join(scriptsPath(cwd, scriptsDir), name);
}
