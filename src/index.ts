export { TaskManager } from './task/taskManager.js';
export type { TaskManagerConfig } from './task/taskManager.js';
export { CancellationToken } from './task/cancellationToken.js';
export { CategoryGate } from './task/categoryGate.js';
export type { GateSnapshot, ReleaseSlot } from './task/categoryGate.js';
export { TaskRegistry } from './task/taskRegistry.js';
export { OperationWrapper } from './task/operationWrapper.js';
export type { ExecuteOptions } from './task/operationWrapper.js';
export { StatusReporter } from './task/statusReporter.js';
export { categoryForTool } from './task/toolCategories.js';
export * from './task/types.js';
export * from './core/errors.js';
export { loadConfig, DEFAULT_CATEGORY_LIMITS, DEFAULT_HISTORY_SIZE } from './core/config.js';
export type { TaskgateConfig } from './core/config.js';
export { createServer, startServer } from './server/index.js';
export { registerManagedTool, defineTool } from './server/toolRegistry.js';
export type { ManagedTool } from './server/toolRegistry.js';
