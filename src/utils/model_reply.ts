/**
 * @fileoverview Model reply validation
 *
 * Routing and safety models are asked for a single JSON object. Replies are
 * extracted from code fences or surrounding prose, parsed, then checked
 * against a Zod schema. Problems come back as short lines that can be shown
 * to the model on a retry.
 *
 * @packageDocumentation
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { getErrorMessage } from './errors.js';

export type ReplyValidation<T> = { ok: true; data: T } | { ok: false; problems: string[] };

export class ModelReplyError extends Error {
  constructor(
    readonly problems: string[],
    readonly rawOutput: string,
  ) {
    super(`Model reply failed validation: ${problems.join('; ')}`);
    this.name = 'ModelReplyError';
  }
}

/**
 * Pull the JSON object out of a reply (fenced block first, then the outermost braces).
 */
export function extractJSON(text: string): string {
  const fenced = text.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (fenced) {
    return fenced[1].trim();
  }

  const object = text.match(/\{[\s\S]*\}/);
  if (object) {
    return object[0];
  }

  return text.trim();
}

export function validateModelReply<T>(raw: string, schema: ZodType<T, ZodTypeDef, unknown>): ReplyValidation<T> {
  let json: unknown;
  try {
    json = JSON.parse(extractJSON(raw));
  } catch (error) {
    return { ok: false, problems: [`reply is not valid JSON: ${getErrorMessage(error)}`] };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return {
      ok: false,
      problems: parsed.error.errors.map((issue) => `${issue.path.join('.') || 'reply'}: ${issue.message}`),
    };
  }
  return { ok: true, data: parsed.data };
}

/**
 * @throws ModelReplyError when the reply is not JSON or does not match `schema`
 */
export function parseModelReply<T>(raw: string, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const result = validateModelReply(raw, schema);
  if (!result.ok) {
    throw new ModelReplyError(result.problems, raw);
  }
  return result.data;
}
