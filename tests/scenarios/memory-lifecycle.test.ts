import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { runConsolidation } from '../../src/memory/consolidation.js';
import { processTurn, startConversation } from '../../src/memory/conversation.js';
import { getMemory, listMemories } from '../../src/memory/db.js';
import { MemoryGateway } from '../../src/memory/tools.js';
import { fixedReply, fixedText } from '../mocks/inference.mock.js';
import { closeTestDatabases, openTestDatabases } from '../utils/db.js';

beforeEach(() => {
  openTestDatabases();
});

afterEach(() => {
  closeTestDatabases();
});

describe('remembering where the user works', () => {
  it('finds the extracted fact when later asked about the job', async () => {
    const ctx = startConversation('conv-osaka');
    await processTurn(ctx, 'I work as a teacher in Osaka', {
      toolCompletion: fixedReply('That sounds rewarding!'),
      textCompletion: fixedText(
        JSON.stringify({
          memories: [{ content: 'Works as a teacher in Osaka', category: 'fact', importance: 0.8 }],
          profile: [{ key: 'city', value: 'Osaka', category: 'personal' }],
        }),
      ),
    });

    const gateway = new MemoryGateway({ conversationId: 'conv-osaka' });
    const search = await gateway.invoke('memory_search', { query: 'job' });
    const profile = await gateway.invoke('profile_get', { keys: ['city'] });

    if (!search.ok) throw new Error(search.error.message);
    expect(search.result).toEqual([
      expect.objectContaining({ content: 'Works as a teacher in Osaka', category: 'fact' }),
    ]);
    expect(profile).toEqual({ ok: true, result: { city: 'Osaka' } });
  });
});

describe('folding a richer duplicate', () => {
  it('keeps one coffee preference after consolidation', async () => {
    const gateway = new MemoryGateway();
    await gateway.invoke('memory_store', {
      content: 'likes coffee',
      category: 'preference',
      importance: 0.4,
    });
    const richer = await gateway.invoke('memory_store', {
      content: 'likes coffee in the morning',
      category: 'preference',
      importance: 0.6,
    });
    expect(richer).toEqual({ ok: true, result: { success: true, memory_id: 2, merged: false } });
    expect(listMemories()).toHaveLength(2);

    const report = await runConsolidation({ textCompletion: fixedText('unused') });

    expect(report.merged).toBe(1);
    const remaining = listMemories({ category: 'preference' });
    expect(remaining.map((m) => m.content)).toEqual(['likes coffee in the morning']);
    expect(remaining[0].importance).toBe(0.6);
    expect(getMemory(1).merged_into).toBe(2);
  });
});
