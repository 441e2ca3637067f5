/**
 * Concurrency module
 */

export { Semaphore, TaskGroup, mapBounded } from './task-group.js';
export type { TaskResult } from './task-group.js';
export { withScope } from './scope.js';
export type { ScopedResource } from './scope.js';
