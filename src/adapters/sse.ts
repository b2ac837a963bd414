import { toWire } from '../core/events';
import type { RelayFrame } from '../relay/progress-relay';

export const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
  'X-Accel-Buffering': 'no'
} as const;

export const KEEPALIVE_FRAME = ': keepalive\n\n';

export function formatSseFrame(frame: RelayFrame): string {
  if (frame.type === 'keepalive') return KEEPALIVE_FRAME;
  return `data: ${JSON.stringify(toWire(frame.event))}\n\n`;
}
