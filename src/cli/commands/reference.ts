import type { Command } from 'commander';
import { parseAgentId } from '../../shared/identity.js';
import { quickReference } from '../../supervisor/reference.js';
import { createContext } from '../context.js';

export function registerReference(program: Command): void {
  program
    .command('reference <agentId>')
    .description('Print the everyday collaboration commands for an agent')
    .action((rawId: string) => {
      const ctx = createContext();
      for (const line of quickReference(ctx.toolkit, parseAgentId(rawId))) console.log(line);
    });
}
