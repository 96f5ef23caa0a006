import os from 'node:os';
import { defineTool } from '../server/toolRegistry.js';

export interface SystemInfo {
    hostname: string;
    platform: NodeJS.Platform;
    release: string;
    arch: string;
    cpus: number;
    totalMemoryBytes: number;
    freeMemoryBytes: number;
    uptimeSeconds: number;
}

export function collectSystemInfo(): SystemInfo {
    return {
        hostname: os.hostname(),
        platform: os.platform(),
        release: os.release(),
        arch: os.arch(),
        cpus: os.cpus().length,
        totalMemoryBytes: os.totalmem(),
        freeMemoryBytes: os.freemem(),
        uptimeSeconds: Math.round(os.uptime())
    };
}

export const systemInfoTool = defineTool({
    name: 'GetSystemInfo',
    title: 'Get system information',
    description: 'Report host name, OS, CPU count, memory and uptime.',
    inputSchema: {},
    run: () => collectSystemInfo()
});
