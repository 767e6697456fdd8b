/**
 * Response parser for refinement results
 */

import { z } from 'zod';
import { createComponentLogger } from '../../utils/logger.js';
import { LLMFatalError } from '../../core/errors.js';
import { REFINEMENT_ACTIONS, SEMANTIC_TYPES } from '../../core/types.js';

const logger = createComponentLogger('refinement-parser');

export const refinementResponseSchema = z.object({
  action: z.enum(REFINEMENT_ACTIONS),
  offset_adjust: z.number().int().default(0),
  semantic_type: z.enum(SEMANTIC_TYPES),
  confidence: z.number().min(0).max(1),
  reason: z.string().default(''),
});

export type RefinementResponse = z.infer<typeof refinementResponseSchema>;

/**
 * Pull the JSON object out of a reply, tolerating markdown fences and
 * surrounding prose
 */
function extractJson(content: string): string {
  let jsonContent = content.trim();

  // Remove markdown code blocks if present
  const fenced = jsonContent.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced && fenced[1]) {
    jsonContent = fenced[1].trim();
  }

  const first = jsonContent.indexOf('{');
  const last = jsonContent.lastIndexOf('}');
  if (first > 0 || (last >= 0 && last < jsonContent.length - 1)) {
    jsonContent = jsonContent.slice(Math.max(0, first), last + 1);
  }
  return jsonContent;
}

/**
 * Parse and validate a refinement reply.
 *
 * @throws LLMFatalError (malformed_response) for anything that is not a
 *   valid refinement object
 */
export function parseRefinementResponse(content: string, provider: string): RefinementResponse {
  const jsonContent = extractJson(content);

  let raw: unknown;
  try {
    raw = JSON.parse(jsonContent);
  } catch (error) {
    const parseError = error instanceof Error ? error : new Error(String(error));
    logger.warn(
      { provider, error: parseError.message, preview: jsonContent.slice(0, 200) },
      'Refinement reply is not JSON'
    );
    throw new LLMFatalError(`Refinement reply is not JSON: ${parseError.message}`, 'malformed_response', provider);
  }

  const result = refinementResponseSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    logger.warn({ provider, issues }, 'Refinement reply failed validation');
    throw new LLMFatalError(`Refinement reply failed validation: ${issues.join('; ')}`, 'malformed_response', provider, {
      issues,
    });
  }

  return result.data;
}
