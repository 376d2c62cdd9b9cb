import client from 'prom-client';

export const registry = new client.Registry();

if (process.env.NODE_ENV !== 'test') {
  client.collectDefaultMetrics({ register: registry, prefix: 'inbox_pilot_' });
}

// ───── HTTP ──────────────────────────────────────────────────────

export const httpRequestDuration = new client.Histogram({
  name: 'inbox_pilot_http_request_duration_seconds',
  help: 'HTTP request duration by route and status',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [registry],
});

// ───── Ingestion / Queue ─────────────────────────────────────────

export const eventsSubmitted = new client.Counter({
  name: 'inbox_pilot_events_submitted_total',
  help: 'Ingestion events offered to the work queue',
  labelNames: ['accepted'] as const,
  registers: [registry],
});

export const eventsProcessed = new client.Counter({
  name: 'inbox_pilot_events_processed_total',
  help: 'Events that finished processing, by disposition',
  labelNames: ['disposition'] as const,
  registers: [registry],
});

export const duplicateDeliveries = new client.Counter({
  name: 'inbox_pilot_duplicate_deliveries_total',
  help: 'Re-deliveries absorbed by the idempotency store',
  labelNames: ['state'] as const,
  registers: [registry],
});

export const eventDuration = new client.Histogram({
  name: 'inbox_pilot_event_duration_seconds',
  help: 'End-to-end processing time per event',
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [registry],
});

export const activeWorkers = new client.Gauge({
  name: 'inbox_pilot_active_workers',
  help: 'Worker slots currently running an event',
  registers: [registry],
});

export const queuedEvents = new client.Gauge({
  name: 'inbox_pilot_queued_events',
  help: 'Events waiting in lanes',
  registers: [registry],
});

// ───── Tickets ───────────────────────────────────────────────────

export const ticketDecisions = new client.Counter({
  name: 'inbox_pilot_ticket_decisions_total',
  help: 'Ticket resolution decisions',
  labelNames: ['decision'] as const,
  registers: [registry],
});

export const ticketOperations = new client.Counter({
  name: 'inbox_pilot_ticket_operations_total',
  help: 'Ticket backend operations by operation and status',
  labelNames: ['operation', 'status'] as const,
  registers: [registry],
});

export const dispatches = new client.Counter({
  name: 'inbox_pilot_dispatches_total',
  help: 'Handler invocations by handler and result',
  labelNames: ['handler', 'result'] as const,
  registers: [registry],
});

export const escalations = new client.Counter({
  name: 'inbox_pilot_escalations_total',
  help: 'Ticket escalations by target level and reason',
  labelNames: ['level', 'reason'] as const,
  registers: [registry],
});

// ───── Dependencies ──────────────────────────────────────────────

export const dependencyCallDuration = new client.Histogram({
  name: 'inbox_pilot_dependency_call_duration_seconds',
  help: 'Duration of single attempts against external collaborators',
  labelNames: ['dependency', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

export const dependencyRetries = new client.Counter({
  name: 'inbox_pilot_dependency_retries_total',
  help: 'Retries scheduled after transient failures',
  labelNames: ['dependency'] as const,
  registers: [registry],
});

export const circuitTransitions = new client.Counter({
  name: 'inbox_pilot_circuit_transitions_total',
  help: 'Circuit breaker state transitions',
  labelNames: ['dependency', 'to'] as const,
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
