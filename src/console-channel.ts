import readline from 'readline';

import { ASSISTANT_NAME } from './config.js';
import { logger } from './logger.js';
import {
  endConversation,
  processTurn,
  startConversation,
} from './memory/conversation.js';
import type { TextCompletion, ToolCompletion } from './memory/inference.js';
import type { ConversationContext } from './memory/types.js';

export interface ConsoleChannelOptions {
  conversationId: string;
  toolCompletion: ToolCompletion;
  textCompletion: TextCompletion;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const END_COMMAND = '/end';

/**
 * Line-based chat on stdin/stdout. `/end` closes the current session; the
 * next message opens a new one. Resolves when input ends.
 */
export function runConsoleChannel(options: ConsoleChannelOptions): Promise<void> {
  const output = options.output ?? process.stdout;
  const rl = readline.createInterface({ input: options.input ?? process.stdin, terminal: false });
  let ctx: ConversationContext | null = null;
  let pending: Promise<void> = Promise.resolve();

  const handleLine = async (line: string): Promise<void> => {
    const text = line.trim();
    if (!text) return;

    if (text === END_COMMAND) {
      const current = ctx;
      if (current) {
        ctx = null;
        await endConversation(current);
        logger.info({ sessionId: current.sessionId }, 'Console session closed');
      }
      return;
    }

    ctx ??= startConversation(options.conversationId);
    await processTurn(ctx, text, {
      toolCompletion: options.toolCompletion,
      textCompletion: options.textCompletion,
      deliver: (reply) => {
        output.write(`${ASSISTANT_NAME}: ${reply}\n`);
      },
    });
  };

  return new Promise((resolve) => {
    rl.on('line', (line) => {
      pending = pending
        .then(() => handleLine(line))
        .catch((err) => logger.error({ err }, 'Console message failed'));
    });
    rl.on('close', () => {
      pending.then(resolve, resolve);
    });
  });
}
