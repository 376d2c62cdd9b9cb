import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseFloat(val);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalChoice<T extends string>(key: string, choices: readonly T[], fallback: T): T {
  const val = process.env[key];
  const match = choices.find((c) => c === val);
  return match ?? fallback;
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),
  adminApiKey: optional('ADMIN_API_KEY', ''),

  redis: {
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'inbox-pilot:'),
  },

  // ───── Pipeline ─────
  pipeline: {
    workerPoolSize: optionalInt('WORKER_POOL_SIZE', 8),
    laneCapacity: optionalInt('LANE_CAPACITY', 50),
    idempotencyExpiryHours: optionalInt('IDEMPOTENCY_EXPIRY_HOURS', 72),
    idempotencySweepIntervalMs: optionalInt('IDEMPOTENCY_SWEEP_INTERVAL_MS', 10 * 60 * 1000),
    pendingLeaseMs: optionalInt('IDEMPOTENCY_PENDING_LEASE_MS', 5 * 60 * 1000),
    processingCeilingMs: optionalInt('PROCESSING_CEILING_MS', 120_000),
    contextMaxTurns: optionalInt('CONTEXT_MAX_TURNS', 10),
    minConfidence: optionalFloat('CLASSIFIER_MIN_CONFIDENCE', 0.6),
    lowConfidencePolicy: optionalChoice('LOW_CONFIDENCE_POLICY', ['fallback', 'proceed'] as const, 'fallback'),
    closedTicketPolicy: optionalChoice('CLOSED_TICKET_POLICY', ['fork', 'reopen'] as const, 'fork'),
  },

  // ───── Resilience defaults (per-dependency overrides live in config/dependencies.json) ─────
  resilience: {
    perCallTimeoutMs: optionalInt('PER_CALL_TIMEOUT_MS', 15_000),
    retryMaxAttempts: optionalInt('RETRY_MAX_ATTEMPTS', 3),
    retryBaseDelayMs: optionalInt('RETRY_BASE_DELAY_MS', 500),
    retryMaxDelayMs: optionalInt('RETRY_MAX_DELAY_MS', 10_000),
    failureThreshold: optionalInt('CB_FAILURE_THRESHOLD', 5),
    cooldownMs: optionalInt('CB_COOLDOWN_MS', 60_000),
  },

  // ───── Classifier (LLM) ─────
  llm: {
    provider: optionalChoice('LLM_PROVIDER', ['openai', 'anthropic', 'gemini'] as const, 'gemini'),
    openai: {
      apiKey: optional('OPENAI_API_KEY', ''),
      model: optional('OPENAI_MODEL', 'gpt-4o-mini'),
      maxTokens: optionalInt('OPENAI_MAX_TOKENS', 512),
      temperature: optionalFloat('OPENAI_TEMPERATURE', 0),
    },
    anthropic: {
      apiKey: optional('ANTHROPIC_API_KEY', ''),
      model: optional('ANTHROPIC_MODEL', 'claude-3-5-haiku-latest'),
      maxTokens: optionalInt('ANTHROPIC_MAX_TOKENS', 512),
      temperature: optionalFloat('ANTHROPIC_TEMPERATURE', 0),
    },
    gemini: {
      apiKey: optional('GEMINI_API_KEY', ''),
      model: optional('GEMINI_MODEL', 'gemini-1.5-flash'),
      maxTokens: optionalInt('GEMINI_MAX_TOKENS', 512),
      temperature: optionalFloat('GEMINI_TEMPERATURE', 0),
    },
  },

  // ───── Collaborators ─────
  helpdesk: {
    baseUrl: optional('HELPDESK_BASE_URL', ''),
    apiToken: optional('HELPDESK_API_TOKEN', ''),
  },

  notifications: {
    slackWebhookUrl: optional('SLACK_WEBHOOK_URL', ''),
  },

  replies: {
    passwordResetUrl: optional('PASSWORD_RESET_URL', 'https://example.com/account/reset'),
    knowledgeResultLimit: optionalInt('KNOWLEDGE_RESULT_LIMIT', 3),
  },

  get isDev(): boolean {
    return this.nodeEnv === 'development' || this.nodeEnv === 'test';
  },
  get isProd(): boolean {
    return this.nodeEnv === 'production';
  },
} as const;
