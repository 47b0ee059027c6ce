import path from 'path';

export const ASSISTANT_NAME = process.env.ASSISTANT_NAME || 'Kioku';

const PROJECT_ROOT = process.cwd();

export const STORE_DIR = path.resolve(PROJECT_ROOT, 'store');
export const CONVERSATION_DB_PATH =
  process.env.CONVERSATION_DB_PATH || path.join(STORE_DIR, 'conversations.db');

// Memory system
export const MEMORY_DIR = path.resolve(PROJECT_ROOT, 'memory');
export const MEMORY_DB_PATH =
  process.env.MEMORY_DB_PATH || path.join(MEMORY_DIR, 'memory.db');

// Models (unset = SDK default)
export const MODEL_MAIN = process.env.MODEL_MAIN || undefined;
export const MODEL_EXTRACTION = process.env.MODEL_EXTRACTION || undefined;
export const MODEL_SUMMARY = process.env.MODEL_SUMMARY || undefined;
export const COMPLETION_TIMEOUT = parseInt(
  process.env.COMPLETION_TIMEOUT || '120000',
  10,
);

// Retrieval
export const SEARCH_DEFAULT_LIMIT = 5;
export const RANK_WEIGHT_IMPORTANCE = parseFloat(
  process.env.RANK_WEIGHT_IMPORTANCE || '0.3',
);
export const RANK_WEIGHT_ACCESS = parseFloat(
  process.env.RANK_WEIGHT_ACCESS || '0.05',
);
export const RANK_WEIGHT_RECENCY = parseFloat(
  process.env.RANK_WEIGHT_RECENCY || '0.2',
);
export const RANK_RECENCY_HALF_LIFE_DAYS = parseFloat(
  process.env.RANK_RECENCY_HALF_LIFE_DAYS || '14',
);

// Near-duplicate detection
export const DEDUP_SIMILARITY_THRESHOLD = parseFloat(
  process.env.DEDUP_SIMILARITY_THRESHOLD || '0.85',
);
export const MERGE_SIMILARITY_THRESHOLD = parseFloat(
  process.env.MERGE_SIMILARITY_THRESHOLD || '0.8',
);
export const DEFAULT_STORE_IMPORTANCE = 0.5;

// Context segmentation
export const WINDOW_MAX_TURNS = parseInt(
  process.env.WINDOW_MAX_TURNS || '20',
  10,
);
export const WINDOW_MAX_TOKENS = parseInt(
  process.env.WINDOW_MAX_TOKENS || '6000',
  10,
);
// One regular expression per line; commas stay usable inside quantifiers like {1,3}
export function parsePatternList(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((p) => p.trim())
    .filter(Boolean);
}

// Matched (case-insensitive) against the user message
export const NEW_TOPIC_PATTERNS = parsePatternList(
  process.env.NEW_TOPIC_PATTERNS ||
    "^\\s*(new topic|let'?s change the subject|change of subject|start (a )?new topic)\\b",
);

// Consolidation
export const DECAY_WINDOW_DAYS = parseFloat(process.env.DECAY_WINDOW_DAYS || '30');
export const DECAY_PERIOD_DAYS = parseFloat(process.env.DECAY_PERIOD_DAYS || '7');
export const DECAY_FACTOR = parseFloat(process.env.DECAY_FACTOR || '0.9');
export const DECAY_MIN_IMPORTANCE = parseFloat(
  process.env.DECAY_MIN_IMPORTANCE || '0.1',
);
export const TURN_RETENTION_DAYS = parseFloat(
  process.env.TURN_RETENTION_DAYS || '30',
);
export const SYSTEM_CONTEXT_MEMORY_LIMIT = 15;
export const SYSTEM_CONTEXT_SUMMARY_LIMIT = 3;

// Consolidation scheduling
export const CONSOLIDATION_POLL_INTERVAL = 60000;
export const CONSOLIDATION_CRON = process.env.CONSOLIDATION_CRON || '0 4 * * *'; // daily, off-peak
export const CONSOLIDATION_TURN_THRESHOLD = parseInt(
  process.env.CONSOLIDATION_TURN_THRESHOLD || '200',
  10,
);

// Timezone for cron expressions
// Uses system timezone by default
export const TIMEZONE =
  process.env.TZ || Intl.DateTimeFormat().resolvedOptions().timeZone;

// Logging
export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
export const LOG_PRETTY = process.env.LOG_PRETTY === 'true';
