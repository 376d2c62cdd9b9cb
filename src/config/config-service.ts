import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import { env } from './env';
import { logger } from '../observability/logger';
import {
  CircuitBreakerPolicy,
  DEPENDENCY_NAMES,
  DependencyName,
  DependencyPolicy,
  RetryPolicy,
} from '../resilience/types';

// Resolve from project root (2 levels up from dist/config/ or src/config/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const DEPENDENCIES_FILE = path.resolve(PROJECT_ROOT, 'config', 'dependencies.json');

export type LowConfidencePolicy = 'fallback' | 'proceed';
export type ClosedTicketPolicy = 'fork' | 'reopen';

export interface PipelineConfig {
  workerPoolSize: number;
  /** Max events (queued + running) per lane */
  perTicketLaneCapacity: number;
  idempotencyExpiryMs: number;
  pendingLeaseMs: number;
  sweepIntervalMs: number;
  processingCeilingMs: number;
  contextMaxTurns: number;
  minConfidence: number;
  lowConfidencePolicy: LowConfidencePolicy;
  closedTicketPolicy: ClosedTicketPolicy;
  resilience: {
    defaults: DependencyPolicy;
    overrides: Partial<Record<DependencyName, DependencyPolicy>>;
  };
}

/** Shape of one entry in config/dependencies.json */
export interface DependencyPolicyOverride {
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  circuitBreaker?: Partial<CircuitBreakerPolicy>;
}

export type DependencyOverrideFile = Partial<Record<DependencyName, DependencyPolicyOverride>>;

const positiveInt = { type: 'integer', minimum: 1 } as const;
const nonNegativeInt = { type: 'integer', minimum: 0 } as const;

const OVERRIDE_FILE_SCHEMA = {
  type: 'object',
  propertyNames: { enum: [...DEPENDENCY_NAMES] },
  additionalProperties: {
    type: 'object',
    additionalProperties: false,
    properties: {
      timeoutMs: positiveInt,
      retry: {
        type: 'object',
        additionalProperties: false,
        properties: {
          maxAttempts: positiveInt,
          baseDelayMs: nonNegativeInt,
          maxDelayMs: nonNegativeInt,
        },
      },
      circuitBreaker: {
        type: 'object',
        additionalProperties: false,
        properties: {
          failureThreshold: positiveInt,
          cooldownMs: nonNegativeInt,
        },
      },
    },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateOverrideFile = ajv.compile<DependencyOverrideFile>(OVERRIDE_FILE_SCHEMA);

/** Merge a partial override onto the global default policy */
export function mergePolicy(defaults: DependencyPolicy, override: DependencyPolicyOverride): DependencyPolicy {
  return {
    timeoutMs: override.timeoutMs ?? defaults.timeoutMs,
    retry: { ...defaults.retry, ...override.retry },
    circuitBreaker: { ...defaults.circuitBreaker, ...override.circuitBreaker },
  };
}

export function resolveOverrides(
  defaults: DependencyPolicy,
  file: DependencyOverrideFile,
): Partial<Record<DependencyName, DependencyPolicy>> {
  const resolved: Partial<Record<DependencyName, DependencyPolicy>> = {};
  for (const name of DEPENDENCY_NAMES) {
    const override = file[name];
    if (override) resolved[name] = mergePolicy(defaults, override);
  }
  return resolved;
}

/**
 * Validate a parsed dependencies.json document.
 * Returns the typed overrides, or the validation errors joined into one line.
 */
export function parseOverrideFile(data: unknown): { ok: true; overrides: DependencyOverrideFile } | { ok: false; reason: string } {
  if (validateOverrideFile(data)) return { ok: true, overrides: data };
  const reason = validateOverrideFile.errors?.map((e) => `${e.instancePath || '/'} ${e.message}`).join('; ') ?? 'invalid';
  return { ok: false, reason };
}

/**
 * A pending admission must outlive the processing ceiling, or a re-delivery could
 * be admitted while the first attempt is still running.
 */
export function checkPipelineConfig(config: PipelineConfig): PipelineConfig {
  if (config.pendingLeaseMs <= config.processingCeilingMs) {
    throw new Error(
      `pendingLeaseMs (${config.pendingLeaseMs}) must exceed processingCeilingMs (${config.processingCeilingMs})`,
    );
  }
  return config;
}

export class ConfigService {
  private config: PipelineConfig;

  constructor(private readonly dependenciesFile: string = DEPENDENCIES_FILE) {
    this.config = this.loadAll();
  }

  loadAll(): PipelineConfig {
    const base = checkPipelineConfig(ConfigService.builtInDefault());
    if (!fs.existsSync(this.dependenciesFile)) {
      logger.warn({ file: this.dependenciesFile }, 'Dependency overrides not found; using global defaults');
      return base;
    }

    try {
      const raw = fs.readFileSync(this.dependenciesFile, 'utf-8');
      const parsed = parseOverrideFile(JSON.parse(raw));
      if (!parsed.ok) {
        logger.error({ file: this.dependenciesFile, reason: parsed.reason }, 'Invalid dependency overrides; ignoring');
        return base;
      }
      const overrides = resolveOverrides(base.resilience.defaults, parsed.overrides);
      logger.info({ dependencies: Object.keys(overrides) }, 'Loaded dependency overrides');
      return { ...base, resilience: { defaults: base.resilience.defaults, overrides } };
    } catch (err) {
      logger.error({ file: this.dependenciesFile, err }, 'Failed to load dependency overrides');
      return base;
    }
  }

  get(): PipelineConfig {
    return this.config;
  }

  reload(): PipelineConfig {
    this.config = this.loadAll();
    return this.config;
  }

  static builtInDefault(): PipelineConfig {
    const r = env.resilience;
    const p = env.pipeline;
    return {
      workerPoolSize: p.workerPoolSize,
      perTicketLaneCapacity: p.laneCapacity,
      idempotencyExpiryMs: p.idempotencyExpiryHours * 60 * 60 * 1000,
      pendingLeaseMs: p.pendingLeaseMs,
      sweepIntervalMs: p.idempotencySweepIntervalMs,
      processingCeilingMs: p.processingCeilingMs,
      contextMaxTurns: p.contextMaxTurns,
      minConfidence: p.minConfidence,
      lowConfidencePolicy: p.lowConfidencePolicy,
      closedTicketPolicy: p.closedTicketPolicy,
      resilience: {
        defaults: {
          timeoutMs: r.perCallTimeoutMs,
          retry: {
            maxAttempts: r.retryMaxAttempts,
            baseDelayMs: r.retryBaseDelayMs,
            maxDelayMs: r.retryMaxDelayMs,
          },
          circuitBreaker: {
            failureThreshold: r.failureThreshold,
            cooldownMs: r.cooldownMs,
          },
        },
        overrides: {},
      },
    };
  }
}

/** Built-in defaults with selected fields replaced; used by tests and embedders */
export function buildPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return checkPipelineConfig({ ...ConfigService.builtInDefault(), ...overrides });
}
