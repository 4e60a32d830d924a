export { executeHook, executeHooks, parseHookOutput, type ExecuteHookOptions } from './executor.js';
