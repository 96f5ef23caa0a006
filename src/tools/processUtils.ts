import { spawnSync, ChildProcess } from 'node:child_process';
import { logger } from '../core/logger.js';

const KILL_GRACE_MS = 250;

export function terminateProcessTree(child: ChildProcess) {
    const pid = child.pid;
    if (!pid) {
        safeKill(() => child.kill());
        return;
    }
    if (process.platform === 'win32') {
        const result = spawnSync('taskkill', ['/pid', pid.toString(), '/t', '/f'], { stdio: 'ignore' });
        if (result.error) {
            logger.warn('shell: taskkill failed, killing child directly', result.error);
            safeKill(() => child.kill());
        }
        return;
    }
    // Children are spawned detached, so the negative pid addresses the whole group.
    safeKill(() => process.kill(-pid, 'SIGTERM'));
    safeKill(() => child.kill('SIGTERM'));
    setTimeout(() => {
        if (child.exitCode !== null || child.signalCode !== null) {
            return;
        }
        safeKill(() => process.kill(-pid, 'SIGKILL'));
        safeKill(() => child.kill('SIGKILL'));
    }, KILL_GRACE_MS).unref();
}

function safeKill(kill: () => unknown) {
    try {
        kill();
    } catch (error) {
        // ESRCH: the process already exited.
        logger.debug('shell: kill signal not delivered', error);
    }
}
