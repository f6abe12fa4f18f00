import { createInterface } from 'node:readline';
import type { Logger } from '../infrastructure/logger.js';
import type { AssistantSession } from './session.js';

export const WELCOME_MESSAGE = 'Welcome to the assistant bot!';
export const PROMPT = 'Enter a command: ';

/** The part of a writable stream the loop needs; process.stdout satisfies it. */
export interface ReplyWriter {
  write(text: string): unknown;
}

export interface RunAssistantOptions {
  input: NodeJS.ReadableStream;
  output: ReplyWriter;
  session: AssistantSession;
  logger: Logger;
}

/**
 * Reads commands line by line until an exit command or the end of input.
 */
export async function runAssistant({
  input,
  output,
  session,
  logger,
}: RunAssistantOptions): Promise<void> {
  const lines = createInterface({ input, crlfDelay: Infinity });

  output.write(`${WELCOME_MESSAGE}\n`);
  output.write(PROMPT);

  let exited = false;
  try {
    for await (const line of lines) {
      const { reply, done } = session.handle(line);
      output.write(`${reply}\n`);
      if (done) {
        exited = true;
        break;
      }
      output.write(PROMPT);
    }
  } finally {
    lines.close();
  }

  logger.info({ reason: exited ? 'exit-command' : 'end-of-input' }, 'Assistant stopped');
}
