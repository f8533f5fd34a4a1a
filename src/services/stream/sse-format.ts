/**
 * SSE wire helpers
 * Frames follow https://html.spec.whatwg.org/multipage/server-sent-events.html
 */

import type { Response } from 'express';
import type { StreamEnvelope } from '../../types/stream.js';

/**
 * Set streaming headers (no caching, no proxy buffering) and flush them
 */
export function openSseResponse(res: Response): void {
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.flushHeaders();
}

export function formatSseFrame(envelope: StreamEnvelope): string {
  return `id: ${envelope.seq}\nevent: ${envelope.type}\ndata: ${JSON.stringify(envelope)}\n\n`;
}

export function formatSseComment(comment: string): string {
  return `: ${comment}\n\n`;
}
