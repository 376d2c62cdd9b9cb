import { v4 as uuidv4 } from 'uuid';

export interface TraceContext {
  requestId: string;
  sourceId?: string;
  ticketId?: string;
  spans: SpanRecord[];
}

export interface SpanRecord {
  name: string;
  startTime: number;
  endTime?: number;
  attributes: Record<string, string | number | boolean>;
  status: 'ok' | 'error';
}

export function createTraceContext(overrides?: Partial<Omit<TraceContext, 'spans'>>): TraceContext {
  return {
    requestId: overrides?.requestId ?? uuidv4(),
    sourceId: overrides?.sourceId,
    ticketId: overrides?.ticketId,
    spans: [],
  };
}

export function startSpan(ctx: TraceContext, name: string, attrs?: Record<string, string | number | boolean>): SpanRecord {
  const span: SpanRecord = {
    name,
    startTime: Date.now(),
    attributes: attrs ?? {},
    status: 'ok',
  };
  ctx.spans.push(span);
  return span;
}

export function endSpan(span: SpanRecord, status: 'ok' | 'error' = 'ok'): void {
  span.endTime = Date.now();
  span.status = status;
}

/** Run `fn` inside a span, marking it failed if `fn` throws */
export async function withSpan<T>(ctx: TraceContext, name: string, fn: () => Promise<T>): Promise<T> {
  const span = startSpan(ctx, name);
  try {
    const result = await fn();
    endSpan(span);
    return result;
  } catch (err) {
    endSpan(span, 'error');
    throw err;
  }
}
