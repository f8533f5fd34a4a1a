/**
 * Stream Publisher
 *
 * Dedicated consumer of one request's event channel. Sequences each event
 * into the session and, when the attached transport signals backpressure,
 * waits for it to drain before taking the next event. Stops after a
 * terminal event or when the channel closes.
 */

import { createLogger } from '../logging/index.js';
import { TERMINAL_EVENT_TYPES, type StreamEvent } from '../../types/stream.js';
import type { EventChannel } from './event-channel.js';
import type { StreamSession } from './stream-session.js';

const logger = createLogger({ module: 'stream-publisher' });

export class StreamPublisher {
  constructor(
    private readonly session: StreamSession,
    private readonly channel: EventChannel<StreamEvent>
  ) {}

  /**
   * Drain the channel into the session. Resolves with the number of events published.
   */
  async run(): Promise<number> {
    let published = 0;
    for await (const event of this.channel) {
      if (this.session.isExpired) {
        logger.debug({ sessionId: this.session.sessionId, type: event.type }, 'Session expired, dropping event');
        continue;
      }

      this.session.append(event);
      published++;

      if (TERMINAL_EVENT_TYPES.has(event.type)) {
        this.channel.close();
        break;
      }
      await this.session.drained();
    }

    logger.debug({ sessionId: this.session.sessionId, published }, 'Publisher finished');
    return published;
  }
}
