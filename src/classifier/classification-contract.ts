import Ajv from 'ajv';
import { Classification, isIntentLabel } from '../config/types';
import { PermanentDependencyError } from '../resilience/errors';
import { parseJsonOutput } from '../llm/json-output';

/**
 * JSON Schema for the classifier response contract.
 * The LLM is instructed to return JSON matching this schema.
 */
export const CLASSIFICATION_SCHEMA = {
  type: 'object',
  required: ['intent', 'confidence'],
  properties: {
    intent: { type: 'string', minLength: 1 },
    confidence: { type: 'number', minimum: 0, maximum: 1 },
    entities: { type: 'object', additionalProperties: true },
    reasoning: { type: 'string' },
  },
};

interface RawClassification {
  intent: string;
  confidence: number;
  entities?: Record<string, unknown>;
  reasoning?: string;
}

const ajv = new Ajv({ allErrors: true });
const validateClassification = ajv.compile<RawClassification>(CLASSIFICATION_SCHEMA);

/** Entity keys that may carry credentials; dropped before anything downstream sees them */
const CREDENTIAL_KEYS = new Set(['password', 'current_pw', 'new_pw', 'old_password', 'new_password']);

/**
 * Parse and validate raw model output.
 * Malformed output is a permanent classifier failure; unknown labels become `fallback_human`.
 */
export function parseClassification(content: string): Classification {
  let data: unknown;
  try {
    data = parseJsonOutput(content);
  } catch (err) {
    throw new PermanentDependencyError('classifier', 'Classifier returned non-JSON output', { cause: err });
  }

  if (!validateClassification(data)) {
    const reason = validateClassification.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new PermanentDependencyError('classifier', `Classifier output violates contract: ${reason}`);
  }

  const rawIntent = data.intent.trim();
  const label = rawIntent.toLowerCase();
  const entities: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data.entities ?? {})) {
    if (!CREDENTIAL_KEYS.has(key.toLowerCase())) entities[key] = value;
  }

  return {
    intent: isIntentLabel(label) ? label : 'fallback_human',
    confidence: data.confidence,
    entities,
    rawIntent,
    reasoning: data.reasoning,
  };
}
