import { ModelReportSchema, ParsedResponse } from '../types/report';
import { errorMessage } from '../utils/errors';

const JSON_FENCE = '```json';
const FENCE = '```';

/**
 * Models wrap JSON in code fences or commentary. Strips a fenced block if
 * present, then falls back to the span between the first `{` and the last `}`.
 * Returns null when no object-shaped span exists.
 */
export function extractJsonObject(raw: string): string | null {
  let cleaned = raw.trim();

  const jsonFenceIndex = cleaned.indexOf(JSON_FENCE);
  if (jsonFenceIndex !== -1) {
    const start = jsonFenceIndex + JSON_FENCE.length;
    const end = cleaned.indexOf(FENCE, start);
    cleaned = (end === -1 ? cleaned.slice(start) : cleaned.slice(start, end)).trim();
  } else {
    const fenceIndex = cleaned.indexOf(FENCE);
    if (fenceIndex !== -1) {
      const start = fenceIndex + FENCE.length;
      const end = cleaned.indexOf(FENCE, start);
      if (end > start) {
        cleaned = cleaned.slice(start, end).trim();
      }
    }
  }

  if (cleaned.startsWith('{') && cleaned.endsWith('}')) {
    return cleaned;
  }

  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) {
    return null;
  }
  return cleaned.slice(start, end + 1);
}

export function parseReportResponse(raw: string): ParsedResponse {
  const candidate = extractJsonObject(raw);
  if (candidate === null) {
    return { kind: 'unparseable', raw, reason: 'No JSON object found in model output' };
  }

  let data: unknown;
  try {
    data = JSON.parse(candidate);
  } catch (error) {
    return { kind: 'unparseable', raw, reason: `Invalid JSON: ${errorMessage(error)}` };
  }

  const result = ModelReportSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { kind: 'unparseable', raw, reason: `Schema validation failed: ${issues}` };
  }

  return { kind: 'parsed', report: result.data };
}
