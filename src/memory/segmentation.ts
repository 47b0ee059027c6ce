import { NEW_TOPIC_PATTERNS, WINDOW_MAX_TOKENS, WINDOW_MAX_TURNS } from '../config.js';
import { advanceWindow, getSession, getWindowTurns } from '../db.js';
import { logger } from '../logger.js';
import type { ConversationContext, ConversationTurn } from './types.js';

export type SegmentationReason = 'commit' | 'explicit' | 'threshold';

export interface SegmentationPolicy {
  newTopicPatterns: RegExp[];
  maxTurns: number;
  maxTokens: number;
}

export interface SegmentationInput {
  userContent: string;
  /** Id of the last turn written for this exchange. */
  currentTurnId: number;
  /** Memories plus goals committed by this turn's extraction. */
  committedCount: number;
}

export interface SegmentationResult {
  advanced: boolean;
  reasons: SegmentationReason[];
  windowStart: number | null;
}

export function compilePatterns(patterns: string[]): RegExp[] {
  return patterns.map((p) => new RegExp(p, 'i'));
}

export const defaultSegmentationPolicy = (): SegmentationPolicy => ({
  newTopicPatterns: compilePatterns(NEW_TOPIC_PATTERNS),
  maxTurns: WINDOW_MAX_TURNS,
  maxTokens: WINDOW_MAX_TOKENS,
});

// Rough estimate: ~4 characters per token
export function estimateTokens(turns: ConversationTurn[]): number {
  const chars = turns.reduce((sum, t) => sum + t.content.length, 0);
  return Math.ceil(chars / 4);
}

/**
 * Decide whether the active window should start fresh after this turn.
 * On any trigger the pointer moves just past the current turn; stored turns
 * are untouched.
 */
export function evaluateSegmentation(
  ctx: ConversationContext,
  input: SegmentationInput,
  policy: SegmentationPolicy = defaultSegmentationPolicy(),
): SegmentationResult {
  const reasons: SegmentationReason[] = [];

  if (input.committedCount > 0) reasons.push('commit');

  if (policy.newTopicPatterns.some((re) => re.test(input.userContent))) {
    reasons.push('explicit');
  }

  const window = getWindowTurns(ctx.sessionId);
  if (window.length > policy.maxTurns || estimateTokens(window) > policy.maxTokens) {
    reasons.push('threshold');
  }

  if (reasons.length === 0) {
    return {
      advanced: false,
      reasons,
      windowStart: getSession(ctx.sessionId).window_start_turn_id,
    };
  }

  const session = advanceWindow(ctx.sessionId, input.currentTurnId + 1);
  logger.info(
    {
      conversationId: ctx.conversationId,
      sessionId: ctx.sessionId,
      reasons,
      windowStart: session.window_start_turn_id,
    },
    'Context window advanced',
  );
  return { advanced: true, reasons, windowStart: session.window_start_turn_id };
}
