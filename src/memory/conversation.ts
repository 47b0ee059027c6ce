import { appendTurn, closeSession, getWindowTurns, openSession } from '../db.js';
import { logger } from '../logger.js';
import { errorMessage } from './errors.js';
import { enqueueExtraction, type ExtractionOutcome } from './extraction.js';
import { buildSystemContext } from './generate-context.js';
import type { TextCompletion, ToolCompletion } from './inference.js';
import { conversationKey, memoryLocks, sessionKey } from './locks.js';
import {
  evaluateSegmentation,
  type SegmentationPolicy,
  type SegmentationResult,
} from './segmentation.js';
import { ASSISTANT_SYSTEM_PROMPT } from './system-prompt.js';
import { MemoryGateway } from './tools.js';
import type { ConversationContext, ConversationTurn, Session } from './types.js';

export const FALLBACK_REPLY = 'Sorry, I was unable to complete that request.';

export interface ProcessTurnOptions {
  toolCompletion: ToolCompletion;
  textCompletion: TextCompletion;
  /** Called with the reply as soon as it is final, before extraction runs. */
  deliver?: (reply: string) => void | Promise<void>;
  signal?: AbortSignal;
  segmentationPolicy?: SegmentationPolicy;
}

export interface TurnOutcome {
  reply: string;
  ok: boolean;
  extraction: ExtractionOutcome | null;
  segmentation: SegmentationResult | null;
}

export function startConversation(conversationId: string): ConversationContext {
  const session = openSession(conversationId);
  return { conversationId, sessionId: session.id };
}

/** Close the session; the next `startConversation` opens a fresh one. */
export function endConversation(ctx: ConversationContext): Promise<Session> {
  return memoryLocks.run(conversationKey(ctx.conversationId), () =>
    memoryLocks.run(sessionKey(ctx.sessionId), () => closeSession(ctx.sessionId)),
  );
}

function buildPrompt(history: ConversationTurn[], userMessage: string): string {
  const transcript = history
    .map((t) => `<${t.role}>${t.content}</${t.role}>`)
    .join('\n');
  const earlier = transcript ? `<conversation>\n${transcript}\n</conversation>\n\n` : '';
  return `${earlier}<user>${userMessage}</user>`;
}

function buildSystemPrompt(): string {
  const context = buildSystemContext();
  return context ? `${ASSISTANT_SYSTEM_PROMPT}\n\n# Memory\n\n${context}` : ASSISTANT_SYSTEM_PROMPT;
}

/**
 * Run one user turn end to end: completion (with memory tools), delivery,
 * extraction, segmentation. Turns of the same conversation never overlap.
 */
export function processTurn(
  ctx: ConversationContext,
  userMessage: string,
  options: ProcessTurnOptions,
): Promise<TurnOutcome> {
  return memoryLocks.run(conversationKey(ctx.conversationId), () =>
    memoryLocks.run(sessionKey(ctx.sessionId), () => runTurn(ctx, userMessage, options)),
  );
}

async function runTurn(
  ctx: ConversationContext,
  userMessage: string,
  options: ProcessTurnOptions,
): Promise<TurnOutcome> {
  const meta = { conversationId: ctx.conversationId, sessionId: ctx.sessionId };

  // Any failure up to a stored reply ends the turn with the generic answer
  let userTurn: ConversationTurn;
  let assistantTurn: ConversationTurn;
  let reply: string;
  try {
    const history = getWindowTurns(ctx.sessionId);
    userTurn = appendTurn(ctx.sessionId, 'user', userMessage);
    const gateway = new MemoryGateway({
      conversationId: ctx.conversationId,
      signal: options.signal,
    });
    reply = await options.toolCompletion.complete({
      systemPrompt: buildSystemPrompt(),
      prompt: buildPrompt(history, userMessage),
      gateway,
      signal: options.signal,
    });
    if (options.signal?.aborted) throw new Error('Generation was aborted');
    if (!reply.trim()) throw new Error('Empty reply');
    assistantTurn = appendTurn(ctx.sessionId, 'assistant', reply);
  } catch (err) {
    logger.error({ ...meta, err: errorMessage(err) }, 'Turn failed');
    await options.deliver?.(FALLBACK_REPLY);
    return { reply: FALLBACK_REPLY, ok: false, extraction: null, segmentation: null };
  }

  await options.deliver?.(reply);

  const extraction = await enqueueExtraction(
    {
      ...meta,
      userMessage,
      assistantResponse: reply,
      timestamp: userTurn.timestamp,
    },
    options.textCompletion,
  );

  let segmentation: SegmentationResult | null = null;
  try {
    segmentation = evaluateSegmentation(
      ctx,
      {
        userContent: userMessage,
        currentTurnId: assistantTurn.id,
        committedCount: extraction.committedMemories + extraction.committedGoals,
      },
      options.segmentationPolicy,
    );
  } catch (err) {
    logger.error({ ...meta, err: errorMessage(err) }, 'Segmentation failed');
  }

  return { reply, ok: true, extraction, segmentation };
}
