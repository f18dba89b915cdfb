import { createInterface } from 'node:readline';
import { NexusError } from '../shared/errors.js';

export class InputClosedError extends NexusError {
  constructor() {
    super('Input ended before the agent was configured. Pass --id, --kind and --description to run without a prompt.');
  }
}

async function ask(lines: AsyncIterator<string>, output: NodeJS.WritableStream, question: string): Promise<string> {
  output.write(question);
  const next = await lines.next();
  if (next.done) throw new InputClosedError();
  return next.value.trim();
}

export interface IdentityAnswers {
  id?: string;
  kind?: string;
  description?: string;
}

export interface PromptIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/** Asks only for the fields not already given on the command line. */
export async function promptIdentity(
  given: IdentityAnswers,
  io: PromptIO = { input: process.stdin, output: process.stdout },
): Promise<{ id: string; kind: string; description: string }> {
  if (given.id !== undefined && given.kind !== undefined && given.description !== undefined) {
    return { id: given.id, kind: given.kind, description: given.description };
  }

  const rl = createInterface({ input: io.input, terminal: false });
  // The iterator buffers lines, so piped answers are not lost between questions
  const lines = rl[Symbol.asyncIterator]();
  try {
    const id = given.id ?? await ask(lines, io.output, 'Enter your agent ID (e.g., agent1): ');
    const kind = given.kind ?? await ask(lines, io.output, 'Enter your agent type (e.g., llm, coding, research): ');
    const description = given.description ?? await ask(lines, io.output, 'Enter a brief agent description: ');
    return { id, kind, description };
  } finally {
    rl.close();
  }
}
