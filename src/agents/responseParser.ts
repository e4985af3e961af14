import { z } from 'zod';
import { ClassificationSchema, type ClassificationOutput } from './schemas';
import { SchemaValidationError } from './errors';

function formatValidationErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => `- ${issue.path.join('.')}: ${issue.message}`);
}

export function stripCodeFences(rawText: string): string {
  let text = rawText.trim();
  if (!text.startsWith('```')) {
    return text;
  }
  const newline = text.indexOf('\n');
  text = newline === -1 ? '' : text.slice(newline + 1).trim();
  if (text.endsWith('```')) {
    text = text.slice(0, -3).trimEnd();
  }
  return text;
}

/** Text between the first `{` and the last `}`, or the input when there is no such span. */
export function extractJsonCandidate(text: string): string {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end !== -1 && start < end) {
    return text.slice(start, end + 1);
  }
  return text;
}

export function parseClassificationResponse(rawText: string): ClassificationOutput {
  const candidate = extractJsonCandidate(stripCodeFences(rawText));

  let data: unknown;
  try {
    data = JSON.parse(candidate);
  } catch (parseError) {
    throw new SchemaValidationError(
      `Response is not valid JSON: ${parseError instanceof Error ? parseError.message : String(parseError)}`
    );
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new SchemaValidationError('Response JSON is not an object');
  }

  const result = ClassificationSchema.safeParse(data);
  if (!result.success) {
    throw new SchemaValidationError(
      'Response is missing required classification fields',
      formatValidationErrors(result.error)
    );
  }
  return result.data;
}
