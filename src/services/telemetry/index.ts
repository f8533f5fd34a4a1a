export { TraceRecorder } from './trace-recorder.js';
export { MemoryTraceStore } from './memory-trace-store.js';
export { PgTraceStore } from './pg-trace-store.js';
export { digest } from './digest.js';
