import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z, ZodRawShape } from 'zod';
import { SubmissionRejectedError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { textResponse } from '../core/utils.js';
import type { CancellationToken } from '../task/cancellationToken.js';
import type { TaskManager } from '../task/taskManager.js';
import { categoryForTool } from '../task/toolCategories.js';
import { TaskCategory, isTaskCategory } from '../task/types.js';

export interface ManagedTool<Shape extends ZodRawShape> {
    name: string;
    title: string;
    description: string;
    /** Falls back to the built-in tool category table when omitted. */
    category?: string;
    inputSchema: Shape;
    run: (args: z.infer<z.ZodObject<Shape>>, token: CancellationToken) => unknown;
}

export function defineTool<Shape extends ZodRawShape>(tool: ManagedTool<Shape>) {
    return tool;
}

export function resolveToolCategory(name: string, category?: string): TaskCategory {
    const resolved = category ?? categoryForTool(name);
    if (!isTaskCategory(resolved)) {
        throw new SubmissionRejectedError(
            resolved === undefined
                ? `Tool ${name} has no category`
                : `Tool ${name} uses unknown category ${resolved}`
        );
    }
    return resolved;
}

/**
 * Registers an MCP tool whose calls run as tracked tasks. The category is
 * checked here, once, so calls never reach the core with an unknown one.
 */
export function registerManagedTool<Shape extends ZodRawShape>(
    server: McpServer,
    manager: TaskManager,
    tool: ManagedTool<Shape>
) {
    const category = resolveToolCategory(tool.name, tool.category);
    const argsSchema = z.object(tool.inputSchema);
    const inputSchema: ZodRawShape = tool.inputSchema;
    server.registerTool(
        tool.name,
        {
            title: tool.title,
            description: `${tool.description} Runs as a tracked ${category} task.`,
            inputSchema
        },
        async (input, _extra) => {
            const parsed = argsSchema.safeParse(input);
            if (!parsed.success) {
                const issue = parsed.error.issues[0];
                const message = issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid arguments';
                return textResponse({ success: false, error: message }, true);
            }
            const outcome = await manager.submit(category, (token) => tool.run(parsed.data, token), {
                toolName: tool.name
            });
            return textResponse(outcome, !outcome.success);
        }
    );
    logger.debug('server: registered managed tool', { tool: tool.name, category });
    return category;
}
