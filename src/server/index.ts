import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { TaskgateConfig, loadConfig } from '../core/config.js';
import { TaskNotFoundError } from '../core/errors.js';
import { logger, setLogLevel } from '../core/logger.js';
import { serializeErrorForClient, textResponse } from '../core/utils.js';
import { TaskManager } from '../task/taskManager.js';
import { TaskStatus } from '../task/types.js';
import { fileReadTool } from '../tools/fileRead.js';
import { portCheckTool } from '../tools/portCheck.js';
import { shellTool } from '../tools/shell.js';
import { systemInfoTool } from '../tools/systemInfo.js';
import { waitTool } from '../tools/wait.js';
import { registerManagedTool } from './toolRegistry.js';

export const SERVER_NAME = 'taskgate-mcp';
export const SERVER_VERSION = '0.1.0';

const taskStatuses = ['pending', 'running', 'succeeded', 'failed', 'cancelled'] as const satisfies readonly TaskStatus[];

export interface ServerOptions {
    shellTimeoutMs: number;
}

export function registerControlTools(server: McpServer, manager: TaskManager) {
    server.registerTool(
        'CancelTask',
        {
            title: 'Cancel task',
            description:
                'Request cancellation of a pending or running task. Pending tasks never start; running tasks stop only if the operation honours the request.',
            inputSchema: { taskId: z.string().min(1) }
        },
        async ({ taskId }) => {
            const result = manager.cancelTask(taskId);
            return textResponse(result, !result.ok);
        }
    );

    server.registerTool(
        'GetTaskStatus',
        {
            title: 'Get task status',
            description: 'Return one task by id, or the recent task history (newest first) when no id is given.',
            inputSchema: { taskId: z.string().min(1).optional() }
        },
        async ({ taskId }) => {
            if (taskId === undefined) {
                return textResponse({ tasks: manager.getTaskStatus() });
            }
            try {
                return textResponse(manager.getTaskStatus(taskId));
            } catch (error) {
                if (error instanceof TaskNotFoundError) {
                    return textResponse({ error: 'NotFound', message: error.message }, true);
                }
                return textResponse({ error: serializeErrorForClient(error) }, true);
            }
        }
    );

    server.registerTool(
        'GetRunningTasks',
        {
            title: 'List active tasks',
            description: 'Return pending and running tasks, oldest submission first, with per-category gate usage.'
        },
        async () => textResponse({ tasks: manager.getRunningTasks(), gates: manager.gateSnapshot() })
    );

    server.registerTool(
        'ListTasks',
        {
            title: 'List tasks',
            description: 'List active and recent tasks, newest first, optionally filtered by status.',
            inputSchema: {
                status: z.enum(taskStatuses).optional(),
                limit: z.number().int().positive().max(500).optional()
            }
        },
        async ({ status, limit }) => textResponse({ tasks: manager.listTasks({ status, limit }) })
    );
}

export function registerBuiltinTools(server: McpServer, manager: TaskManager, options: ServerOptions) {
    registerManagedTool(server, manager, waitTool);
    registerManagedTool(server, manager, systemInfoTool);
    registerManagedTool(server, manager, fileReadTool);
    registerManagedTool(server, manager, shellTool(options.shellTimeoutMs));
    registerManagedTool(server, manager, portCheckTool);
}

export function createServer(manager: TaskManager, options: ServerOptions) {
    const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
    registerControlTools(server, manager);
    registerBuiltinTools(server, manager, options);
    manager.onTransition((task, from) => {
        logger.info('task: status transition', {
            taskId: task.id,
            tool: task.toolName,
            from,
            to: task.status
        });
    });
    return server;
}

export async function startServer(config: TaskgateConfig = loadConfig()) {
    setLogLevel(config.logLevel);
    logger.info('server: starting', { pid: process.pid, limits: config.limits, historySize: config.historySize });
    const manager = new TaskManager({ limits: config.limits, historySize: config.historySize });
    const server = createServer(manager, { shellTimeoutMs: config.shellTimeoutMs });
    registerShutdownHandlers(server, manager);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info('server: ready', { pid: process.pid });
    return { server, manager };
}

function registerShutdownHandlers(server: McpServer, manager: TaskManager) {
    let shuttingDown = false;
    const shutdown = async (reason: string) => {
        if (shuttingDown) {
            return;
        }
        shuttingDown = true;
        const cancelled = manager.cancelAll();
        logger.info('server: shutting down', { reason, cancelled });
        await server.close();
    };
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    for (const signal of signals) {
        process.once(signal, () => {
            shutdown(`Server stopped (${signal}).`)
                .catch((error: unknown) => logger.error('server: shutdown failed', error))
                .finally(() => process.exit(0));
        });
    }
}
