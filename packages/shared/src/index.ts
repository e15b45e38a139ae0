export { logger, type Logger } from './logger.js';
export { getTracer, withSpan } from './tracing.js';
