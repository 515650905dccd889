// JSON parser for timeline documents

import { TimelineDocument, safeValidateDocument, describeIssues } from '../../core/schemas.js';

/**
 * Error thrown when a timeline document cannot be parsed
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly reason: 'syntax' | 'schema'
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Parses and validates the raw text of timeline.json
 *
 * @throws ParseError if the text is not JSON or does not match the document schema
 */
export function parseDocument(input: string): TimelineDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(input);
  } catch (error) {
    throw new ParseError(error instanceof Error ? error.message : String(error), 'syntax');
  }

  const result = safeValidateDocument(raw);
  if (!result.success) {
    throw new ParseError(describeIssues(result.error), 'schema');
  }

  return result.data;
}
