/**
 * Result System - Structured task outcomes
 *
 * A result carries the return code, the output streams and a free-form
 * return-value map. Results from successive stages are merged rather
 * than replaced.
 */

export {
  TaskResultSchema,
  createResult,
  cloneResult,
  isErrorResult,
  mergeResults,
  resultFromError,
  formatResult,
  parseResult,
  type TaskResult,
  type TaskResultInit,
} from './result.js';
