import { z } from 'zod';

import { logger } from '../logger.js';
import { commitMemory } from './commit.js';
import { createGoal, findActiveGoalByTitle, upsertProfileAttribute } from './db.js';
import { ExtractionParseError, errorMessage } from './errors.js';
import type { TextCompletion } from './inference.js';
import { memoryLocks } from './locks.js';
import { EXTRACTION_SYSTEM_PROMPT } from './system-prompt.js';
import { GOAL_PRIORITIES, MEMORY_CATEGORIES, type TurnPair } from './types.js';

export type ExtractionState =
  | 'Pending'
  | 'PromptBuilt'
  | 'Invoked'
  | 'ParseAttempted'
  | 'Committed'
  | 'Discarded';

export interface ExtractionOutcome {
  state: 'Committed' | 'Discarded';
  transitions: ExtractionState[];
  committedMemories: number;
  committedGoals: number;
  profileUpdates: number;
  /** Why the pair was discarded. */
  reason?: string;
}

// --- Response shape ---

const ExtractedMemorySchema = z.object({
  content: z.string().trim().min(1),
  category: z.enum(MEMORY_CATEGORIES),
  importance: z.number().min(0).max(1),
});

const ExtractedGoalSchema = z.object({
  title: z.string().trim().min(1),
  description: z.string().nullish(),
  deadline: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .nullish(),
  priority: z.enum(GOAL_PRIORITIES).optional(),
});

const ExtractedProfileSchema = z.object({
  key: z.string().trim().min(1),
  value: z.union([z.string(), z.number(), z.boolean()]).transform(String),
  category: z.string().nullish(),
});

const ExtractionSchema = z.union([
  z.array(ExtractedMemorySchema).transform((memories) => ({
    memories,
    goals: [],
    profile: [],
  })),
  z.object({
    memories: z.array(ExtractedMemorySchema).default([]),
    goals: z.array(ExtractedGoalSchema).default([]),
    profile: z.array(ExtractedProfileSchema).default([]),
  }),
]);

export type ExtractionResult = z.infer<typeof ExtractionSchema>;

/**
 * Parse the model's reply. Accepts a bare JSON array of memories or the full
 * object form, optionally inside a ```json fence. Anything else throws.
 */
export function parseExtraction(text: string): ExtractionResult {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  const body = (fenced ? fenced[1] : text).trim();

  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (err) {
    throw new ExtractionParseError(`Response is not valid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const parsed = ExtractionSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join('.') || 'root'}: ${i.message}`)
      .join('; ');
    throw new ExtractionParseError(`Response does not match the extraction shape: ${detail}`);
  }
  return parsed.data;
}

export function buildExtractionPrompt(pair: TurnPair): string {
  return `Exchange to analyse:
<exchange time="${pair.timestamp}">
<user>${pair.userMessage}</user>
<assistant>${pair.assistantResponse}</assistant>
</exchange>

What, if anything, should be remembered about the user? Reply with JSON only.`;
}

// --- Pipeline ---

async function commitExtraction(
  result: ExtractionResult,
  meta: { conversationId: string; sessionId: number },
): Promise<Pick<ExtractionOutcome, 'committedMemories' | 'committedGoals' | 'profileUpdates'>> {
  let committedMemories = 0;
  let committedGoals = 0;
  let profileUpdates = 0;

  for (const memory of result.memories) {
    try {
      await commitMemory(memory);
      committedMemories++;
    } catch (err) {
      logger.error({ ...meta, err: errorMessage(err) }, 'Failed to commit extracted memory');
    }
  }

  for (const goal of result.goals) {
    try {
      if (findActiveGoalByTitle(goal.title)) continue;
      createGoal(goal);
      committedGoals++;
    } catch (err) {
      logger.error({ ...meta, err: errorMessage(err) }, 'Failed to commit extracted goal');
    }
  }

  for (const attr of result.profile) {
    try {
      upsertProfileAttribute(attr.key, attr.value, attr.category ?? null);
      profileUpdates++;
    } catch (err) {
      logger.error({ ...meta, err: errorMessage(err) }, 'Failed to update profile attribute');
    }
  }

  return { committedMemories, committedGoals, profileUpdates };
}

/**
 * Analyse one finalised exchange and commit what it reveals about the user.
 * Never throws: completion and parse failures end in `Discarded`.
 */
export async function runExtraction(
  pair: TurnPair,
  textCompletion: TextCompletion,
): Promise<ExtractionOutcome> {
  const meta = { conversationId: pair.conversationId, sessionId: pair.sessionId };
  const transitions: ExtractionState[] = ['Pending'];
  const discard = (reason: string): ExtractionOutcome => {
    transitions.push('Discarded');
    return {
      state: 'Discarded',
      transitions,
      committedMemories: 0,
      committedGoals: 0,
      profileUpdates: 0,
      reason,
    };
  };

  const prompt = buildExtractionPrompt(pair);
  transitions.push('PromptBuilt');

  let response: string;
  try {
    response = await textCompletion.complete(prompt, { systemPrompt: EXTRACTION_SYSTEM_PROMPT });
    transitions.push('Invoked');
  } catch (err) {
    logger.warn({ ...meta, err: errorMessage(err) }, 'Extraction completion failed');
    return discard(`completion failed: ${errorMessage(err)}`);
  }

  let result: ExtractionResult;
  transitions.push('ParseAttempted');
  try {
    result = parseExtraction(response);
  } catch (err) {
    logger.warn(
      { ...meta, err: errorMessage(err), response: response.slice(0, 200) },
      'Extraction output discarded',
    );
    return discard(errorMessage(err));
  }

  const counts = await commitExtraction(result, meta);
  transitions.push('Committed');
  logger.info({ ...meta, ...counts }, 'Extraction committed');
  return { state: 'Committed', transitions, ...counts };
}

export const extractionKey = (conversationId: string): string => `extraction:${conversationId}`;

/** Queue extraction behind earlier pairs of the same conversation. */
export function enqueueExtraction(
  pair: TurnPair,
  textCompletion: TextCompletion,
): Promise<ExtractionOutcome> {
  return memoryLocks.run(extractionKey(pair.conversationId), () =>
    runExtraction(pair, textCompletion),
  );
}
