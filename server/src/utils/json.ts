import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import logger from './logger.js';

// Attempt to repair common JSON issues from AI responses
export function repairJson(jsonText: string): string {
  // Remove trailing commas before closing brackets/braces
  let repaired = jsonText.replace(/,(\s*[\]}])/g, '$1');

  // Close brackets a truncated response left open
  const openBraces = (repaired.match(/\{/g) || []).length;
  const closeBraces = (repaired.match(/\}/g) || []).length;
  const openBrackets = (repaired.match(/\[/g) || []).length;
  const closeBrackets = (repaired.match(/\]/g) || []).length;

  for (let i = 0; i < openBrackets - closeBrackets; i++) {
    repaired += ']';
  }
  for (let i = 0; i < openBraces - closeBraces; i++) {
    repaired += '}';
  }

  return repaired;
}

/**
 * Pull the JSON payload out of a model reply: a fenced code block if present,
 * otherwise the outermost object.
 */
export function extractJsonText(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    return fenced[1].trim();
  }
  const raw = text.match(/\{[\s\S]*\}/);
  return raw ? raw[0] : text.trim();
}

/**
 * Parse and validate a JSON reply. Throws ValidationError when the text is not
 * JSON even after repair, or when it does not match the schema.
 */
export function parseJsonResponse<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T {
  const jsonText = extractJsonText(text);

  let data: unknown;
  try {
    data = JSON.parse(jsonText);
  } catch {
    logger.warn('JSON', `Initial JSON parse failed for ${label}, attempting repair...`);
    try {
      data = JSON.parse(repairJson(jsonText));
      logger.info('JSON', `JSON repair successful for ${label}`);
    } catch (error) {
      logger.error('JSON', `JSON parsing failed for ${label}`, `First 500 chars: ${jsonText.slice(0, 500)}`);
      throw new ValidationError(
        `JSON parsing failed for ${label}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(`Response for ${label} did not match the expected shape`, result.error.issues);
  }
  return result.data;
}
