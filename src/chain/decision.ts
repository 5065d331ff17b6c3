import { z } from 'zod';
import { jsonrepair } from 'jsonrepair';
import { CompletionParseError } from '../core/errors';
import type { FieldValues } from '../types';

// ---------------- JSON contract from the completion collaborator -------------
const DecisionSchema = z.object({
  route: z.string().nullable(),
  extracted_fields: z.record(z.string(), z.unknown()).nullable(),
  out_of_scope: z.boolean(),
  confirmed: z.boolean().nullable(),
  done: z.boolean().optional().default(false),
  message: z.string().nullable().optional().default(null),
});

export interface Decision {
  route: string | null;
  extractedFields: FieldValues;
  outOfScope: boolean;
  confirmed: boolean | null;
  done: boolean;
  message: string | null;
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    const first = raw.indexOf('{');
    const last = raw.lastIndexOf('}');
    if (first === -1 || last <= first) {
      throw new CompletionParseError('No JSON object found in completion', { raw });
    }

    try {
      return JSON.parse(jsonrepair(raw.slice(first, last + 1)));
    } catch (repairError) {
      throw new CompletionParseError('Completion is not valid JSON', {
        raw,
        error: repairError instanceof Error ? repairError.message : String(repairError),
      });
    }
  }
}

/**
 * Parse the collaborator's JSON-mode reply into a Decision. Anything outside
 * the schema fails with CompletionParseError; nothing is guessed.
 */
export function parseDecision(raw: string): Decision {
  const result = DecisionSchema.safeParse(parseJson(raw.trim()));

  if (!result.success) {
    throw new CompletionParseError('Completion does not match the decision schema', {
      raw,
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }

  const { route, extracted_fields, out_of_scope, confirmed, done, message } = result.data;
  const trimmedRoute = route?.trim();
  const trimmedMessage = message?.trim();

  return {
    route: trimmedRoute ? trimmedRoute : null,
    extractedFields: extracted_fields ?? {},
    outOfScope: out_of_scope,
    confirmed,
    done,
    message: trimmedMessage ? trimmedMessage : null,
  };
}
