import { SYSTEM_CONTEXT_MEMORY_LIMIT, SYSTEM_CONTEXT_SUMMARY_LIMIT } from '../config.js';
import { listRecentSummaries } from '../db.js';
import { getProfileAttributes, listGoals, listTopMemories } from './db.js';
import type { Goal } from './types.js';

export interface SystemContextLimits {
  memories: number;
  summaries: number;
}

function formatGoal(goal: Goal): string {
  const parts = [`progress ${goal.progress}%`, `priority ${goal.priority}`];
  if (goal.deadline) parts.push(`deadline ${goal.deadline}`);
  const description = goal.description ? `: ${goal.description}` : '';
  return `- [#${goal.id}] ${goal.title}${description} (${parts.join(', ')})`;
}

/**
 * Render what is known about the user as markdown for the system
 * instruction. Empty sections are left out; returns '' when memory is empty.
 */
export function buildSystemContext(
  limits: SystemContextLimits = {
    memories: SYSTEM_CONTEXT_MEMORY_LIMIT,
    summaries: SYSTEM_CONTEXT_SUMMARY_LIMIT,
  },
): string {
  const sections: string[] = [];

  const profile = getProfileAttributes();
  if (profile.length > 0) {
    sections.push(
      `## User profile\n${profile.map((p) => `- ${p.key}: ${p.value}`).join('\n')}`,
    );
  }

  const goals = listGoals('active');
  if (goals.length > 0) {
    sections.push(`## Active goals\n${goals.map(formatGoal).join('\n')}`);
  }

  const memories = listTopMemories(limits.memories);
  if (memories.length > 0) {
    sections.push(
      `## What you remember\n${memories.map((m) => `- (${m.category}) ${m.content}`).join('\n')}`,
    );
  }

  const summaries = listRecentSummaries(limits.summaries);
  if (summaries.length > 0) {
    sections.push(
      `## Recent conversations\n${summaries
        .map((s) => `- ${(s.ended_at ?? s.started_at).slice(0, 10)}: ${s.summary}`)
        .join('\n')}`,
    );
  }

  return sections.join('\n\n');
}
