export type SessionKind = 'conversation' | 'generation';

export type ProgressEvent =
  | {
      kind: 'tool_dispatched';
      data: { session: SessionKind; tool: string; call_id: string; iteration: number; is_error: boolean };
    }
  | { kind: 'rasterization_progress'; data: { slide_number: number; total_slides: number; filename: string } }
  | { kind: 'assembly_progress'; data: { slide_number: number; total_slides: number } }
  | { kind: 'complete'; data: { response: string; pptx_file: string | null } }
  | { kind: 'error'; data: { message: string } };

export type ProgressKind = ProgressEvent['kind'];

export type ProgressSink = (event: ProgressEvent) => void;

/** Wire shape shared by the SSE and WebSocket streams. */
export function toWire(event: ProgressEvent): { event: ProgressKind; data: ProgressEvent['data'] } {
  return { event: event.kind, data: event.data };
}
