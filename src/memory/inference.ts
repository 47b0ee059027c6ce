import { query } from '@anthropic-ai/claude-agent-sdk';

import { COMPLETION_TIMEOUT, MEMORY_DIR } from '../config.js';
import { logger } from '../logger.js';
import { MEMORY_TOOL_NAMES, createMemoryMcpServer, type MemoryGateway } from './tools.js';

/** Plain prompt-in, text-out completion. No tools. */
export interface TextCompletion {
  complete(prompt: string, options: { systemPrompt: string }): Promise<string>;
}

export interface ToolCompletionRequest {
  systemPrompt: string;
  prompt: string;
  /** Memory operations the model may call while generating. */
  gateway: MemoryGateway;
  signal?: AbortSignal;
}

/** Completion during which the model may invoke the gateway any number of times. */
export interface ToolCompletion {
  complete(request: ToolCompletionRequest): Promise<string>;
}

function linkAbort(signal: AbortSignal | undefined, timeoutMs: number): {
  controller: AbortController;
  dispose: () => void;
} {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  return {
    controller,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    },
  };
}

export function createClaudeTextCompletion(model?: string): TextCompletion {
  return {
    async complete(prompt, { systemPrompt }) {
      const { controller, dispose } = linkAbort(undefined, COMPLETION_TIMEOUT);
      let resultText = '';
      try {
        for await (const message of query({
          prompt,
          options: {
            model,
            cwd: MEMORY_DIR,
            allowedTools: [],
            permissionMode: 'bypassPermissions',
            settingSources: [],
            systemPrompt,
            maxTurns: 1,
            abortController: controller,
          },
        })) {
          if (message.type === 'result' && message.subtype === 'success') {
            resultText = message.result;
          }
        }
      } finally {
        dispose();
      }
      return resultText;
    },
  };
}

export function createClaudeToolCompletion(model?: string): ToolCompletion {
  return {
    async complete({ systemPrompt, prompt, gateway, signal }) {
      const { controller, dispose } = linkAbort(signal, COMPLETION_TIMEOUT);
      const t0 = Date.now();
      let resultText = '';
      let toolCalls = 0;
      try {
        for await (const message of query({
          prompt,
          options: {
            model,
            cwd: MEMORY_DIR,
            allowedTools: MEMORY_TOOL_NAMES,
            permissionMode: 'bypassPermissions',
            settingSources: [],
            systemPrompt,
            mcpServers: { memory: createMemoryMcpServer(gateway) },
            abortController: controller,
          },
        })) {
          if (message.type === 'assistant') {
            for (const block of message.message.content) {
              if (block.type === 'tool_use') toolCalls++;
            }
          }
          if (message.type === 'result') {
            if (message.subtype !== 'success') {
              throw new Error(`Completion ended with ${message.subtype}`);
            }
            resultText = message.result;
          }
        }
      } finally {
        dispose();
      }
      logger.debug({ ms: Date.now() - t0, toolCalls }, 'Tool completion done');
      return resultText;
    },
  };
}
