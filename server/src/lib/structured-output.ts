import type { z } from 'zod';
import {
  DecodeError,
  MalformedStructuredDataError,
  NoStructuredDataFoundError,
  SchemaValidationError,
  StructuredOutputError,
} from './errors.js';

/**
 * Structured-output extractor for LLM responses.
 *
 * Generated text is untrusted input: it may be wrapped in markdown fences,
 * preceded or followed by prose, or carry trailing commas. The extractor
 * isolates the first balanced JSON object, applies light repair, decodes it
 * and validates it against a zod schema. Every failure is classified.
 */

const OPENING_FENCE = /^```[\w-]*[ \t]*\r?\n?/;
const CLOSING_FENCE = /\r?\n?[ \t]*```$/;

/**
 * Step 1: drop a code fence wrapping the whole response. Fences elsewhere are
 * left for the string-aware scan, so backticks inside values survive.
 */
export function stripCodeFences(text: string): string {
  return text.trim().replace(OPENING_FENCE, '').replace(CLOSING_FENCE, '').trim();
}

/**
 * Steps 2–3: find the first `{` and scan to its matching `}`, tracking
 * string state and escapes so braces inside string values are ignored.
 */
export function locateJsonObject(text: string): string {
  const start = text.indexOf('{');
  if (start < 0) {
    throw new NoStructuredDataFoundError(text);
  }

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  throw new MalformedStructuredDataError(text, depth);
}

/**
 * Step 4: remove commas that directly precede a closing `}` or `]`.
 * Commas inside string values are left alone.
 */
export function removeTrailingCommas(json: string): string {
  let out = '';
  let inString = false;
  let escape = false;

  for (let i = 0; i < json.length; i++) {
    const ch = json[i];
    if (inString) {
      out += ch;
      if (escape) escape = false;
      else if (ch === '\\') escape = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
      out += ch;
      continue;
    }
    if (ch === ',') {
      let j = i + 1;
      while (j < json.length && /\s/.test(json[j])) j++;
      if (json[j] === '}' || json[j] === ']') continue;
    }
    out += ch;
  }

  return out;
}

/** Steps 1–5: isolate, repair and decode the JSON object in `raw`. */
export function decodeStructured(raw: string): unknown {
  const candidate = removeTrailingCommas(locateJsonObject(stripCodeFences(raw)));
  try {
    return JSON.parse(candidate);
  } catch (err) {
    throw new DecodeError(raw, err);
  }
}

/** Step 6: validate an already-decoded value against `schema`. */
export function validateStructured<S extends z.ZodTypeAny>(
  value: unknown,
  schema: S,
  raw: string,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new SchemaValidationError(raw, result.error.issues);
  }
  return result.data;
}

/**
 * Parse raw generated text into a schema-validated value.
 * Pure; throws a `StructuredOutputError` subclass on failure.
 */
export function extractStructured<S extends z.ZodTypeAny>(raw: string, schema: S): z.output<S> {
  return validateStructured(decodeStructured(raw), schema, raw);
}

/** The parts of a generation result the extractor reads. */
export interface GeneratedOutput {
  text: string;
  structured?: Record<string, unknown>;
}

/**
 * Parse a generation result. Output the provider already returned as a
 * structured tool call skips text extraction but is still validated.
 */
export function parseGenerated<S extends z.ZodTypeAny>(output: GeneratedOutput, schema: S): z.output<S> {
  if (output.structured) {
    return validateStructured(output.structured, schema, output.text || JSON.stringify(output.structured));
  }
  return extractStructured(output.text, schema);
}

export type ExtractionResult<T> =
  | { success: true; data: T }
  | { success: false; error: StructuredOutputError };

function attempt<T>(fn: () => T): ExtractionResult<T> {
  try {
    return { success: true, data: fn() };
  } catch (err) {
    if (err instanceof StructuredOutputError) {
      return { success: false, error: err };
    }
    throw err;
  }
}

/**
 * Non-throwing variant for stages that absorb extraction failures with a
 * deterministic fallback. Errors other than extraction failures still throw.
 */
export function tryExtractStructured<S extends z.ZodTypeAny>(
  raw: string,
  schema: S,
): ExtractionResult<z.output<S>> {
  return attempt(() => extractStructured(raw, schema));
}

export function tryParseGenerated<S extends z.ZodTypeAny>(
  output: GeneratedOutput,
  schema: S,
): ExtractionResult<z.output<S>> {
  return attempt(() => parseGenerated(output, schema));
}
