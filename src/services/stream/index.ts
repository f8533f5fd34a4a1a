export { EventChannel } from './event-channel.js';
export { StreamSession, type StreamError, type StreamErrorCode, type StreamSessionSnapshot } from './stream-session.js';
export { StreamSessionManager, type SessionManagerOptions } from './session-manager.js';
export { StreamPublisher } from './stream-publisher.js';
export { openSseResponse, formatSseFrame, formatSseComment } from './sse-format.js';
