import { SCRIPTS, type AgentToolkit } from './toolkit.js';

export function quickReference(toolkit: AgentToolkit, agentId: string): string[] {
  const message = JSON.stringify({ from: agentId, to: 'all', message: 'Hello' });
  const proposal = JSON.stringify({ from: agentId, component: 'X', description: 'Y' });

  const rows: Array<[string, string]> = [
    ['Send message:', toolkit.displayCommand(SCRIPTS.logEvent, ['message', `'${message}'`])],
    ['Make proposal:', toolkit.displayCommand(SCRIPTS.logEvent, ['proposal', `'${proposal}'`])],
    ['Update status:', toolkit.displayCommand(SCRIPTS.status, ['status', agentId, 'active', '"Working on task X"'])],
    ['View messages:', 'cat communication.md'],
    ['List agents:', toolkit.displayCommand(SCRIPTS.status, ['list'])],
    ['Generate snapshot:', toolkit.displayCommand(SCRIPTS.snapshot)],
  ];

  return ['=== Quick Reference Commands ===', ...rows.map(([label, command]) => `  ${label.padEnd(19)}${command}`)];
}
