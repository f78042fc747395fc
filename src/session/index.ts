/**
 * Session
 *
 * Explicit session state plus the listening lifecycle built on it.
 */

export { createState, statusOf } from './state';
export { create } from './controller';
export type { ControllerInstance } from './controller';
export { createPipeline } from './pipeline';
export type { PipelineParts } from './pipeline';
export * from './types';
