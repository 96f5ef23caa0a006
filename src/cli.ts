#!/usr/bin/env node
import { TaskgateConfig, loadConfig } from './core/config.js';
import { logger } from './core/logger.js';
import { formatError } from './core/utils.js';
import { startServer } from './server/index.js';

function readConfigOrExit(): TaskgateConfig {
    try {
        return loadConfig();
    } catch (error) {
        logger.error('server: invalid configuration', formatError(error));
        process.exit(1);
    }
}

startServer(readConfigOrExit()).catch((error: unknown) => {
    logger.error('server: failed to start', formatError(error));
    process.exit(1);
});
