import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ConfigService,
  buildPipelineConfig,
  mergePolicy,
  parseOverrideFile,
  resolveOverrides,
} from '../../src/config/config-service';
import { DependencyPolicy } from '../../src/resilience/types';

const defaults: DependencyPolicy = {
  timeoutMs: 15_000,
  retry: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 10_000 },
  circuitBreaker: { failureThreshold: 5, cooldownMs: 60_000 },
};

describe('mergePolicy', () => {
  it('should replace only the fields the override names', () => {
    expect(mergePolicy(defaults, { retry: { maxAttempts: 5 }, circuitBreaker: { cooldownMs: 1_000 } })).toEqual({
      timeoutMs: 15_000,
      retry: { maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 10_000 },
      circuitBreaker: { failureThreshold: 5, cooldownMs: 1_000 },
    });
  });

  it('should leave the defaults untouched', () => {
    mergePolicy(defaults, { timeoutMs: 1, retry: { maxAttempts: 1 } });
    expect(defaults.timeoutMs).toBe(15_000);
    expect(defaults.retry.maxAttempts).toBe(3);
  });
});

describe('resolveOverrides', () => {
  it('should resolve only dependencies present in the file', () => {
    const resolved = resolveOverrides(defaults, { reports: { timeoutMs: 60_000 } });
    expect(Object.keys(resolved)).toEqual(['reports']);
    expect(resolved.reports?.timeoutMs).toBe(60_000);
    expect(resolved.reports?.retry).toEqual(defaults.retry);
  });
});

describe('parseOverrideFile', () => {
  it('should accept a well-formed document', () => {
    const doc = { classifier: { timeoutMs: 30_000, retry: { maxAttempts: 2 } } };
    expect(parseOverrideFile(doc)).toEqual({ ok: true, overrides: doc });
  });

  it('should report out-of-range values with their path', () => {
    expect(parseOverrideFile({ classifier: { timeoutMs: 0 } })).toEqual({
      ok: false,
      reason: '/classifier/timeoutMs must be >= 1',
    });
  });

  it('should reject unknown dependencies and unknown fields', () => {
    expect(parseOverrideFile({ database: { timeoutMs: 10 } }).ok).toBe(false);
    expect(parseOverrideFile({ classifier: { retries: 3 } }).ok).toBe(false);
    expect(parseOverrideFile([]).ok).toBe(false);
  });
});

describe('ConfigService', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should fall back to the built-in defaults when the file is missing', () => {
    const service = new ConfigService(path.join(dir, 'missing.json'));
    expect(service.get()).toEqual(ConfigService.builtInDefault());
  });

  it('should apply per-dependency overrides from the file', () => {
    const file = path.join(dir, 'dependencies.json');
    fs.writeFileSync(file, JSON.stringify({ ticketing: { timeoutMs: 4_000 } }));

    const config = new ConfigService(file).get();
    const base = ConfigService.builtInDefault().resilience.defaults;

    expect(config.resilience.defaults).toEqual(base);
    expect(config.resilience.overrides).toEqual({ ticketing: { ...base, timeoutMs: 4_000 } });
  });

  it('should ignore an invalid or unparsable file', () => {
    const file = path.join(dir, 'dependencies.json');
    fs.writeFileSync(file, JSON.stringify({ ticketing: { timeoutMs: -5 } }));
    expect(new ConfigService(file).get().resilience.overrides).toEqual({});

    fs.writeFileSync(file, '{ not json');
    expect(new ConfigService(file).get().resilience.overrides).toEqual({});
  });

  it('should pick up file changes on reload', () => {
    const file = path.join(dir, 'dependencies.json');
    fs.writeFileSync(file, '{}');
    const service = new ConfigService(file);
    expect(service.get().resilience.overrides).toEqual({});

    fs.writeFileSync(file, JSON.stringify({ memory: { retry: { maxAttempts: 1 } } }));
    expect(service.reload().resilience.overrides.memory?.retry.maxAttempts).toBe(1);
  });

  it('should ship a valid dependencies.json', () => {
    const overrides = new ConfigService().get().resilience.overrides;
    expect(overrides.classifier?.timeoutMs).toBe(30_000);
    expect(overrides.reports?.circuitBreaker.failureThreshold).toBe(3);
  });
});

describe('buildPipelineConfig', () => {
  it('should override selected fields on top of the defaults', () => {
    const config = buildPipelineConfig({ workerPoolSize: 2, closedTicketPolicy: 'reopen' });
    expect(config.workerPoolSize).toBe(2);
    expect(config.closedTicketPolicy).toBe('reopen');
    expect(config.contextMaxTurns).toBe(ConfigService.builtInDefault().contextMaxTurns);
  });

  it('should refuse a pending lease that does not outlast the processing ceiling', () => {
    expect(() => buildPipelineConfig({ pendingLeaseMs: 1_000, processingCeilingMs: 1_000 })).toThrow(
      'pendingLeaseMs (1000) must exceed processingCeilingMs (1000)',
    );
    expect(buildPipelineConfig({ pendingLeaseMs: 1_001, processingCeilingMs: 1_000 }).pendingLeaseMs).toBe(1_001);
  });
});
