export { ActionExecutor } from './action-executor.js';
export type { ActionCompletedInfo, ActionSkippedInfo, ExecutionOptions } from './action-executor.js';
