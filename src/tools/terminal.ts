import { z } from 'zod';
import { errorMessage } from '../observability/logger';
import { formatIssues } from './registry';

export const COMPLETION_MARKER = 'PRESENTATION_GENERATION_COMPLETE:';

export const terminalResultSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  slide_count: z.number().int().nonnegative(),
  slide_files: z.array(z.string())
});

export type TerminalResult = z.infer<typeof terminalResultSchema>;

export type DecodedTerminal = { ok: true; result: TerminalResult } | { ok: false; error: string };

export function encodeTerminalResult(result: TerminalResult): string {
  return `${COMPLETION_MARKER} ${JSON.stringify(result)}`;
}

export function hasCompletionMarker(content: string): boolean {
  return content.startsWith(COMPLETION_MARKER);
}

export function decodeTerminalResult(content: string): DecodedTerminal {
  if (!hasCompletionMarker(content)) {
    return { ok: false, error: 'completion marker not found' };
  }
  const payload = content.slice(COMPLETION_MARKER.length).trim();
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (err) {
    return { ok: false, error: `payload is not JSON (${errorMessage(err)})` };
  }
  const parsed = terminalResultSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: formatIssues(parsed.error) };
  }
  return { ok: true, result: parsed.data };
}

export function failedTerminal(message: string): TerminalResult {
  return { success: false, message, slide_count: 0, slide_files: [] };
}
