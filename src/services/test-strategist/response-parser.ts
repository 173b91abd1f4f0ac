/**
 * Response-to-structure adapter
 *
 * The only place that looks at raw model output. Everything downstream
 * receives validated values or an explicit failure.
 */

import type { z } from 'zod';

export type StructuredResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

const FENCE_PATTERN = /```(?:[a-zA-Z0-9_-]*[ \t]*\r?\n)?([\s\S]*?)```/;

/**
 * Remove a Markdown code fence around the payload, if there is one.
 * Text outside the first fenced block is dropped.
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(FENCE_PATTERN);
  if (match) {
    return (match[1] ?? '').trim();
  }
  // An unterminated fence still carries its language tag
  return trimmed.replace(/^```(?:[a-zA-Z0-9_-]*[ \t]*\r?\n)?/, '').replace(/```$/, '').trim();
}

/**
 * Decode JSON from model output and validate it against a zod schema
 */
export function parseStructuredResponse<S extends z.ZodTypeAny>(
  text: string,
  schema: S
): StructuredResult<z.output<S>> {
  const payload = stripCodeFences(text);

  if (!payload) {
    return { success: false, error: 'Response is empty' };
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(payload);
  } catch (error) {
    return {
      success: false,
      error: `Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const result = schema.safeParse(decoded);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    return { success: false, error: `Response does not match the expected shape: ${details}` };
  }

  return { success: true, data: result.data };
}

/**
 * Read a single positive integer from model output, e.g. "3" or "```\n3\n```"
 */
export function parseIntegerResponse(text: string): StructuredResult<number> {
  const payload = stripCodeFences(text);

  if (!/^[+-]?\d+$/.test(payload)) {
    return { success: false, error: `Expected a single integer, got '${payload.slice(0, 50)}'` };
  }

  return { success: true, data: Number.parseInt(payload, 10) };
}
