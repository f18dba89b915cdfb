import type { Platform } from '../shared/types.js';
import { DependencyMissingError } from '../shared/errors.js';
import type { ToolProbe } from './exec.js';

interface Requirement {
  tool: string;
  pkg: string;
  platforms: readonly Platform[];
}

const REQUIREMENTS: readonly Requirement[] = [
  { tool: 'jq', pkg: 'jq', platforms: ['linux', 'darwin', 'win32'] },
  { tool: 'inotifywait', pkg: 'inotify-tools', platforms: ['linux'] },
  { tool: 'fswatch', pkg: 'fswatch', platforms: ['darwin'] },
];

/** Package names of the tools the collaborator scripts need but PATH lacks. */
export function missingDependencies(platform: Platform, probe: ToolProbe): string[] {
  return REQUIREMENTS
    .filter(req => req.platforms.includes(platform) && !probe.has(req.tool))
    .map(req => req.pkg);
}

export function installInstructions(platform: Platform, missing: string[], probe: ToolProbe): string[] {
  const list = missing.join(' ');
  switch (platform) {
    case 'linux':
      if (probe.has('apt-get')) return [`sudo apt-get update && sudo apt-get install -y ${list}`];
      if (probe.has('yum')) return [`sudo yum install -y ${list}`];
      return ['Unsupported Linux distribution. Please install dependencies manually:', ...missing.map(dep => `  - ${dep}`)];
    case 'darwin':
      if (probe.has('brew')) return [`brew install ${list}`];
      return [
        'Homebrew not found. Please install it first:',
        '  /bin/bash -c "$(curl -fsSL https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh)"',
        `Then run: brew install ${list}`,
      ];
    case 'win32':
      if (probe.has('choco')) return [`choco install -y ${list}`];
      return [
        'Chocolatey not found. Please install it first: https://chocolatey.org/install',
        'Or install these dependencies manually:',
        ...missing.map(dep => (dep === 'jq' ? '  - jq: https://stedolan.github.io/jq/download/' : `  - ${dep}`)),
      ];
  }
}

export function checkDependencies(platform: Platform, probe: ToolProbe): void {
  const missing = missingDependencies(platform, probe);
  if (missing.length > 0) {
    throw new DependencyMissingError(missing, installInstructions(platform, missing, probe));
  }
}
