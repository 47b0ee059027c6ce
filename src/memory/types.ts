export const MEMORY_CATEGORIES = [
  'fact',
  'preference',
  'personality',
  'skill',
  'goal-related',
] as const;

export type MemoryCategory = (typeof MEMORY_CATEGORIES)[number];

export const GOAL_PRIORITIES = ['low', 'medium', 'high'] as const;
export type GoalPriority = (typeof GOAL_PRIORITIES)[number];

export const GOAL_STATUSES = ['active', 'completed', 'archived'] as const;
export type GoalStatus = (typeof GOAL_STATUSES)[number];

export type TurnRole = 'user' | 'assistant';

export interface MemoryRecord {
  id: number;
  content: string;
  category: MemoryCategory;
  importance: number; // 0.0 - 1.0
  access_count: number;
  last_accessed_at: string | null; // ISO timestamp
  created_at: string;
  updated_at: string;
  decayed_at: string | null;
  archived_at: string | null;
  merged_into: number | null;
}

export interface Goal {
  id: number;
  title: string;
  description: string | null;
  deadline: string | null; // YYYY-MM-DD
  priority: GoalPriority;
  status: GoalStatus;
  progress: number; // 0 - 100
  created_at: string;
  updated_at: string;
}

export interface ProfileAttribute {
  key: string;
  value: string;
  category: string | null;
  updated_at: string;
}

export interface Session {
  id: number;
  conversation_id: string;
  started_at: string;
  ended_at: string | null;
  summary: string | null;
  window_start_turn_id: number | null;
}

export interface ConversationTurn {
  id: number;
  session_id: number;
  role: TurnRole;
  content: string;
  timestamp: string;
  archived_at: string | null;
}

/**
 * Explicit per-conversation state threaded through every call.
 * `sessionId` is the session currently open for this conversation.
 */
export interface ConversationContext {
  conversationId: string;
  sessionId: number;
}

/** A finalised exchange handed to the extraction pipeline. */
export interface TurnPair {
  conversationId: string;
  sessionId: number;
  userMessage: string;
  assistantResponse: string;
  timestamp: string;
}

export function isMemoryCategory(value: string): value is MemoryCategory {
  return (MEMORY_CATEGORIES as readonly string[]).includes(value);
}

export function isGoalStatus(value: string): value is GoalStatus {
  return (GOAL_STATUSES as readonly string[]).includes(value);
}

export function isGoalPriority(value: string): value is GoalPriority {
  return (GOAL_PRIORITIES as readonly string[]).includes(value);
}
