import Fastify, { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env } from './config/env';
import { ConfigService, PipelineConfig } from './config/config-service';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { DependencyHealthManager } from './resilience/dependency-health';
import { ResilienceWrapper } from './resilience/resilience-wrapper';
import { systemClock } from './resilience/retry';
import { ResilienceClock } from './resilience/types';
import { createIdempotencyStore } from './idempotency/idempotency-store';
import { ExpirySweeper } from './idempotency/expiry-sweeper';
import { IdempotencyStore } from './idempotency/types';
import { createTicketBackend } from './ticketing/ticketing-service';
import { TicketBackend } from './ticketing/types';
import { TicketResolutionEngine } from './ticketing/resolution-engine';
import { createConversationMemory } from './memory/conversation-memory';
import { ConversationMemory } from './memory/types';
import { buildProvider } from './llm/provider-factory';
import { PromptLibrary } from './llm/prompt-library';
import { LlmReplyComposer, ReplyComposer } from './llm/reply-composer';
import { IntentClassifier, LlmIntentClassifier, UnconfiguredClassifier } from './classifier/intent-classifier';
import { KnowledgeService } from './knowledge/knowledge-service';
import { ManagedKnowledgeStore } from './knowledge/types';
import { EscalationTracker } from './escalation/escalation-tracker';
import { InMemoryReportGenerator, ReportGenerator } from './reports/report-generator';
import { InMemoryDraftStore } from './drafts/draft-store';
import { DraftStore } from './drafts/types';
import { createNotifier } from './escalation/notifier';
import { Notifier } from './escalation/types';
import { FallbackHandler } from './handlers/fallback-handler';
import { BankStatementHandler } from './handlers/bank-statement-handler';
import { PasswordUpdateHandler } from './handlers/password-update-handler';
import { GeneralQueryHandler } from './handlers/general-query-handler';
import { DispatchRouter } from './handlers/dispatch-router';
import { createErrorQueue } from './queue/error-queue';
import { ErrorQueue } from './queue/types';
import { WorkQueue } from './queue/work-queue';
import { Orchestrator } from './orchestrator/orchestrator';
import { registerEmailWebhook } from './ingestion/webhook-routes';
import { registerAdminRoutes } from './admin/admin-routes';

/** Collaborators a caller may supply instead of the environment-driven defaults */
export interface AppOverrides {
  config: PipelineConfig;
  /** null skips Redis entirely */
  redis: Redis | null;
  clock: ResilienceClock;
  idempotency: IdempotencyStore;
  tickets: TicketBackend;
  memory: ConversationMemory;
  classifier: IntentClassifier;
  knowledge: ManagedKnowledgeStore;
  composer: ReplyComposer | null;
  reports: ReportGenerator;
  drafts: DraftStore;
  notifier: Notifier;
  errorQueue: ErrorQueue;
  adminApiKey: string;
}

export interface Pipeline {
  config: PipelineConfig;
  health: DependencyHealthManager;
  resilience: ResilienceWrapper;
  idempotency: IdempotencyStore;
  tickets: TicketBackend;
  memory: ConversationMemory;
  drafts: DraftStore;
  knowledge: ManagedKnowledgeStore;
  escalations: EscalationTracker;
  notifier: Notifier;
  errorQueue: ErrorQueue;
  router: DispatchRouter;
  orchestrator: Orchestrator;
}

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  queue: WorkQueue;
  sweeper: ExpirySweeper;
  pipeline: Pipeline;
}

async function connectRedis(): Promise<Redis | undefined> {
  if (!env.redis.url) {
    logger.warn('REDIS_URL not set; using in-memory stores');
    return undefined;
  }
  try {
    const redisInstance = new Redis(env.redis.url, {
      keyPrefix: env.redis.keyPrefix,
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

function buildComposerAndClassifier(prompts: PromptLibrary): {
  classifier: IntentClassifier;
  composer: ReplyComposer | null;
} {
  const provider = buildProvider(env.llm.provider, {
    openai: env.llm.openai,
    anthropic: env.llm.anthropic,
    gemini: env.llm.gemini,
  });
  if (!provider) return { classifier: new UnconfiguredClassifier(), composer: null };
  return { classifier: new LlmIntentClassifier(provider, prompts), composer: new LlmReplyComposer(provider, prompts) };
}

export async function buildApp(overrides: Partial<AppOverrides> = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    bodyLimit: 1_048_576, // 1 MB
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  const redis = overrides.redis === null ? undefined : (overrides.redis ?? (await connectRedis()));
  const config = overrides.config ?? new ConfigService().get();

  // ───── Resilience ─────
  const clock = overrides.clock ?? systemClock;
  const health = new DependencyHealthManager(config.resilience.defaults, config.resilience.overrides, () => clock.now());
  const resilience = new ResilienceWrapper(health, clock);

  // ───── Stores ─────
  const idempotency =
    overrides.idempotency ??
    createIdempotencyStore({ expiryMs: config.idempotencyExpiryMs, pendingLeaseMs: config.pendingLeaseMs }, redis);
  const memory = overrides.memory ?? createConversationMemory(redis);
  const errorQueue = overrides.errorQueue ?? createErrorQueue(redis);
  const tickets = overrides.tickets ?? createTicketBackend();
  const drafts = overrides.drafts ?? new InMemoryDraftStore();
  const notifier = overrides.notifier ?? createNotifier();
  const knowledge = overrides.knowledge ?? new KnowledgeService();
  const escalations = new EscalationTracker(notifier, resilience, () => clock.now());

  // ───── Classifier + LLM ─────
  let classifier = overrides.classifier;
  let composer = overrides.composer;
  if (!classifier || composer === undefined) {
    const built = buildComposerAndClassifier(new PromptLibrary());
    classifier = classifier ?? built.classifier;
    composer = composer === undefined ? built.composer : composer;
  }

  // ───── Handlers ─────
  const fallback = new FallbackHandler(notifier, resilience);
  const router = new DispatchRouter(
    {
      handlers: [
        new BankStatementHandler(overrides.reports ?? new InMemoryReportGenerator(), resilience),
        new PasswordUpdateHandler(notifier, resilience, { passwordResetUrl: env.replies.passwordResetUrl }),
        new GeneralQueryHandler(
          knowledge,
          resilience,
          { resultLimit: env.replies.knowledgeResultLimit },
          composer,
        ),
      ],
      fallback,
      drafts,
      memory,
      tickets,
      resilience,
    },
    { minConfidence: config.minConfidence, lowConfidencePolicy: config.lowConfidencePolicy },
  );

  // ───── Pipeline ─────
  const engine = new TicketResolutionEngine(tickets, resilience, { closedTicketPolicy: config.closedTicketPolicy });
  const orchestrator = new Orchestrator(
    { idempotency, classifier, engine, memory, router, errorQueue, resilience },
    { contextMaxTurns: config.contextMaxTurns },
  );
  const queue = new WorkQueue(orchestrator, {
    workerPoolSize: config.workerPoolSize,
    perTicketLaneCapacity: config.perTicketLaneCapacity,
    processingCeilingMs: config.processingCeilingMs,
  });

  const sweeper = new ExpirySweeper(idempotency, config.sweepIntervalMs);

  logger.info(
    {
      workerPoolSize: config.workerPoolSize,
      laneCapacity: config.perTicketLaneCapacity,
      processingCeilingMs: config.processingCeilingMs,
      lowConfidencePolicy: config.lowConfidencePolicy,
      closedTicketPolicy: config.closedTicketPolicy,
    },
    'Pipeline initialized',
  );

  // ───── Register Routes ─────
  registerEmailWebhook(app, queue);
  registerAdminRoutes(app, {
    errorQueue,
    idempotency,
    queue,
    health,
    drafts,
    knowledge,
    escalations,
    tickets,
    resilience,
    adminApiKey: overrides.adminApiKey,
  });

  // Drain admitted work before the HTTP server goes away
  app.addHook('onClose', async () => {
    sweeper.stop();
    await queue.close();
  });

  return {
    app,
    redis,
    queue,
    sweeper,
    pipeline: {
      config,
      health,
      resilience,
      idempotency,
      tickets,
      memory,
      drafts,
      knowledge,
      escalations,
      notifier,
      errorQueue,
      router,
      orchestrator,
    },
  };
}
