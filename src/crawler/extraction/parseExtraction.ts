import { z } from 'zod';

import { createParseError } from '../../errors.js';
import type { ExtractionRecord } from '../../types.js';
import { stripReasoning } from '../../util/reasoning.js';

const extractionBlockSchema = z.object({
  tag: z.string().default('No Tag'),
  content: z
    .union([z.array(z.string()), z.string()])
    .default([])
    .transform((value) => (typeof value === 'string' ? [value] : value)),
  error: z.boolean().default(false),
});

const extractionPayloadSchema = z.array(extractionBlockSchema);

const CODE_FENCE = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/;

/**
 * Parses a structured-extraction response into records. Reasoning blocks and a
 * surrounding code fence are removed first; anything that is still not a JSON
 * list of `{tag, content, error?}` objects is a parse error.
 */
export function parseExtractionPayload(raw: string): ExtractionRecord[] {
  const cleaned = stripWrapping(raw);

  let data: unknown;
  try {
    data = JSON.parse(cleaned);
  } catch (error) {
    throw createParseError(
      'Failed to parse extracted content as JSON',
      { length: raw.length },
      { severity: 'fatal', cause: error },
    );
  }

  const parsed = extractionPayloadSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw createParseError(
      `Extracted content does not match the expected block list: ${issue?.message ?? 'invalid'}`,
      { path: issue?.path.join('.') },
      { severity: 'fatal' },
    );
  }

  return parsed.data.map((block) => ({
    tag: block.tag,
    contentLines: block.content,
    error: block.error,
  }));
}

function stripWrapping(raw: string): string {
  const withoutThinking = stripReasoning(raw).trim();
  const fenced = CODE_FENCE.exec(withoutThinking);
  return fenced ? fenced[1].trim() : withoutThinking;
}
