import { createSdkMcpServer, tool } from '@anthropic-ai/claude-agent-sdk';
import { z } from 'zod';

import { DEFAULT_STORE_IMPORTANCE, SEARCH_DEFAULT_LIMIT } from '../config.js';
import { logger } from '../logger.js';
import { commitMemory } from './commit.js';
import { createGoal, getProfileAttributes, listGoals, updateGoal } from './db.js';
import {
  MemoryError,
  StoreError,
  ToolNotFoundError,
  ToolValidationError,
  errorMessage,
  type MemoryErrorCode,
} from './errors.js';
import { searchMemories } from './ranker.js';
import { GOAL_STATUSES, MEMORY_CATEGORIES } from './types.js';

export type ToolErrorCode = MemoryErrorCode | 'Aborted';

export type ToolResult =
  | { ok: true; result: unknown }
  | { ok: false; error: { code: ToolErrorCode; message: string } };

const STORE_UNAVAILABLE = 'The memory store is temporarily unavailable.';

interface Operation {
  description: string;
  shape: z.ZodRawShape;
  run(args: unknown): Promise<unknown>;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'arguments'}: ${issue.message}`)
    .join('; ');
}

function operation<T extends z.AnyZodObject>(
  description: string,
  schema: T,
  handler: (args: z.infer<T>) => unknown,
): Operation {
  return {
    description,
    shape: schema.shape,
    async run(args) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) throw new ToolValidationError(formatIssues(parsed.error));
      return handler(parsed.data);
    },
  };
}

// ==================== Operations ====================

const GOAL_LIST_FILTERS = [...GOAL_STATUSES, 'all'] as const;

const operations = {
  memory_search: operation(
    `Search long-term memories about the user. Returns the most relevant memories, best first.`,
    z.object({
      query: z.string().min(1).describe('Search query text'),
      category: z.enum(MEMORY_CATEGORIES).optional().describe('Filter to a specific category'),
      limit: z
        .number()
        .int()
        .positive()
        .optional()
        .describe(`Max results (default ${SEARCH_DEFAULT_LIMIT})`),
    }),
    (args) =>
      searchMemories(args.query, { category: args.category, limit: args.limit }).map((m) => ({
        id: m.id,
        content: m.content,
        category: m.category,
        importance: m.importance,
        access_count: m.access_count,
        created_at: m.created_at,
      })),
  ),

  memory_store: operation(
    `Remember a fact about the user. Near-duplicates of an existing memory in the same category reinforce it instead of creating a new one.`,
    z.object({
      content: z.string().describe('What to remember, as a short standalone sentence'),
      category: z.string().describe(`One of: ${MEMORY_CATEGORIES.join(', ')}`),
      importance: z
        .number()
        .optional()
        .describe(`0.0 - 1.0 (default ${DEFAULT_STORE_IMPORTANCE})`),
    }),
    async (args) => {
      const { record, merged } = await commitMemory({
        content: args.content,
        category: args.category,
        importance: args.importance ?? DEFAULT_STORE_IMPORTANCE,
      });
      return { success: true, memory_id: record.id, merged };
    },
  ),

  goal_list: operation(
    'List the user\'s goals with progress and deadline.',
    z.object({
      status: z
        .enum(GOAL_LIST_FILTERS)
        .optional()
        .describe('active (default), completed, archived or all'),
    }),
    (args) => listGoals(args.status ?? 'active'),
  ),

  goal_update: operation(
    'Update progress (0-100) or status of a goal.',
    z.object({
      goal_id: z.number().int().describe('Goal id'),
      progress: z.number().int().optional().describe('Progress percentage, 0-100'),
      status: z.string().optional().describe(`One of: ${GOAL_STATUSES.join(', ')}`),
    }),
    (args) => {
      updateGoal(args.goal_id, { progress: args.progress, status: args.status });
      return { success: true };
    },
  ),

  goal_create: operation(
    'Create a new goal for the user.',
    z.object({
      title: z.string().describe('Short goal title'),
      description: z.string().optional(),
      deadline: z.string().optional().describe('YYYY-MM-DD'),
      priority: z.string().optional().describe('low, medium (default) or high'),
    }),
    (args) => {
      const goal = createGoal(args);
      return { success: true, goal_id: goal.id };
    },
  ),

  profile_get: operation(
    'Read user profile attributes (name, location, occupation...). Omit keys to get all.',
    z.object({
      keys: z.array(z.string()).optional().describe('Attribute keys to fetch'),
    }),
    (args) => {
      const profile: Record<string, string> = {};
      for (const attr of getProfileAttributes(args.keys)) {
        profile[attr.key] = attr.value;
      }
      return profile;
    },
  ),
} satisfies Record<string, Operation>;

export type OperationName = keyof typeof operations;

export const OPERATION_NAMES = Object.keys(operations).filter(isOperationName);

export function isOperationName(name: string): name is OperationName {
  return Object.prototype.hasOwnProperty.call(operations, name);
}

// ==================== Gateway ====================

/**
 * Entry point for model-issued memory operations during one conversation.
 * Calls run strictly one after another; errors come back as results, never
 * as exceptions. Once `signal` aborts, every call is refused.
 */
export class MemoryGateway {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly options: { conversationId?: string; signal?: AbortSignal } = {}) {}

  invoke(name: string, args: unknown): Promise<ToolResult> {
    const result = this.tail.then(() => this.execute(name, args));
    this.tail = result;
    return result;
  }

  private async execute(name: string, args: unknown): Promise<ToolResult> {
    const conversationId = this.options.conversationId;
    if (this.options.signal?.aborted) {
      return { ok: false, error: { code: 'Aborted', message: 'Generation was aborted' } };
    }
    const t0 = Date.now();
    try {
      if (!isOperationName(name)) throw new ToolNotFoundError(`Unknown operation "${name}"`);
      const result = await operations[name].run(args);
      logger.debug({ conversationId, operation: name, ms: Date.now() - t0 }, 'Tool invocation');
      return { ok: true, result };
    } catch (err) {
      return { ok: false, error: toToolError(err, { conversationId, operation: name }) };
    }
  }
}

function toToolError(
  err: unknown,
  meta: { conversationId?: string; operation: string },
): { code: ToolErrorCode; message: string } {
  if (err instanceof MemoryError && !(err instanceof StoreError)) {
    logger.info({ ...meta, code: err.code, err: err.message }, 'Tool invocation rejected');
    return { code: err.code, message: err.message };
  }
  logger.error({ ...meta, err: errorMessage(err) }, 'Tool invocation failed');
  return { code: 'StoreError', message: STORE_UNAVAILABLE };
}

// ==================== Server factory ====================

/** Expose a gateway's operations to the Agent SDK as in-process MCP tools. */
export function createMemoryMcpServer(gateway: MemoryGateway) {
  const tools = OPERATION_NAMES.map((name) =>
    tool(name, operations[name].description, operations[name].shape, async (args) => {
      const outcome = await gateway.invoke(name, args);
      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify(outcome.ok ? outcome.result : outcome.error),
          },
        ],
        ...(outcome.ok ? {} : { isError: true }),
      };
    }),
  );

  return createSdkMcpServer({
    name: 'memory',
    version: '1.0.0',
    tools,
  });
}

export const MEMORY_TOOL_NAMES = OPERATION_NAMES.map((name) => `mcp__memory__${name}`);
