export { tracingPlugin, createTraceIdGenerator, UPSTREAM_TRACE_ID_LOG_KEY } from './tracing.js';
export { actorPlugin } from './actor.js';
