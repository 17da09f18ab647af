import { generateObject, generateText, type LanguageModel } from 'ai';
import type { z } from 'zod';
import { getErrorMessage } from '../../lib/errors';
import { logger } from '../../lib/logger';

interface StructuredOutputOptions<T> {
  model: LanguageModel;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  system: string;
  prompt: string;
  temperature?: number;
  maxOutputTokens?: number;
  abortSignal?: AbortSignal;
  operation: string;
}

const STRUCTURED_OUTPUT_ERROR_PATTERNS = [
  'json_schema',
  'response format',
  'response-format',
  'output format',
  'must be a valid json',
  'failed to parse',
  'could not parse',
  'no object generated',
  'schema output validation failed',
];

export function isSchemaError(error: unknown): boolean {
  const lowerMessage = getErrorMessage(error).toLowerCase();
  return STRUCTURED_OUTPUT_ERROR_PATTERNS.some((pattern) => lowerMessage.includes(pattern));
}

/** Strips code fences and surrounding prose down to the outermost `{...}` */
export function extractJsonObject(raw: string): string {
  const trimmed = raw.trim();
  const fencedMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const candidate = fencedMatch?.[1]?.trim() ?? trimmed;

  const start = candidate.indexOf('{');
  if (start === -1) return candidate;
  const end = candidate.lastIndexOf('}');
  if (end <= start) return candidate.substring(start).trim();

  return candidate.substring(start, end + 1).trim();
}

/** The model answered, but nothing in the answer fits the schema */
export class StructuredOutputParseError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`[${operation}] ${message}`, options);
    this.name = 'StructuredOutputParseError';
    this.operation = operation;
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

/**
 * `generateObject` first; on a structured-output error, asks for plain
 * text and parses the JSON out of it. Transport errors are rethrown as-is
 * so the caller can fall over to the next provider.
 */
export async function generateObjectWithFallback<T>(options: StructuredOutputOptions<T>): Promise<T> {
  try {
    const result = await generateObject({
      model: options.model,
      schema: options.schema,
      system: options.system,
      prompt: options.prompt,
      temperature: options.temperature,
      maxOutputTokens: options.maxOutputTokens,
      abortSignal: options.abortSignal,
    });

    const parsed = options.schema.safeParse(result.object);
    if (!parsed.success) {
      throw new Error(`Schema output validation failed: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
  } catch (error) {
    if (!isSchemaError(error)) {
      throw error;
    }

    logger.warn(`[${options.operation}] Structured output failed, falling back to text + JSON parse`);

    const fallbackResult = await generateText({
      model: options.model,
      system: options.system,
      prompt: [
        'Respond with a single JSON object only.',
        'No explanation, no code fences, no prefix or suffix.',
        options.prompt,
      ].join('\n\n'),
      temperature: options.temperature,
      maxOutputTokens: options.maxOutputTokens,
      abortSignal: options.abortSignal,
    });

    const text = extractJsonObject(fallbackResult.text);
    if (!text) {
      throw new StructuredOutputParseError(options.operation, 'Empty model fallback response');
    }

    let candidate: unknown;
    try {
      candidate = JSON.parse(text);
    } catch (parseError) {
      throw new StructuredOutputParseError(
        options.operation,
        'Structured output failed and text fallback also failed. ' +
          `Original: ${getErrorMessage(error)}. Fallback: ${getErrorMessage(parseError)}`,
        { cause: parseError }
      );
    }

    const parsed = options.schema.safeParse(candidate);
    if (!parsed.success) {
      throw new StructuredOutputParseError(options.operation, `Schema fallback failed: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
  }
}
