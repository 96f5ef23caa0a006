import fs from 'node:fs/promises';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { TaskCancelledError } from '../src/core/errors.js';
import { CancellationToken } from '../src/task/cancellationToken.js';
import { readTextFile } from '../src/tools/fileRead.js';
import { checkPort } from '../src/tools/portCheck.js';
import { runShellCommand } from '../src/tools/shell.js';
import { waitFor } from '../src/tools/wait.js';

describe('waitFor', () => {
    it('resolves after the requested time', async () => {
        await expect(waitFor(30, new CancellationToken(), 10)).resolves.toBe('Waited 30ms');
    });

    it('stops at the next poll once cancelled', async () => {
        const token = new CancellationToken();
        const waiting = waitFor(10_000, token, 10);
        token.cancel();
        await expect(waiting).rejects.toThrow(TaskCancelledError);
    });
});

describe('readTextFile', () => {
    let dir: string;

    beforeAll(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'taskgate-read-'));
        await fs.writeFile(path.join(dir, 'notes.txt'), 'abcdef', 'utf8');
    });

    afterAll(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('returns the content and size', async () => {
        const target = path.join(dir, 'notes.txt');
        await expect(readTextFile(target)).resolves.toEqual({ path: target, sizeBytes: 6, content: 'abcdef' });
    });

    it('refuses files over the byte limit', async () => {
        const target = path.join(dir, 'notes.txt');
        await expect(readTextFile(target, 4)).rejects.toThrow(`${target} is 6 bytes, larger than the 4 byte limit`);
    });

    it('refuses directories', async () => {
        await expect(readTextFile(dir)).rejects.toThrow(`${dir} is not a file`);
    });
});

describe('checkPort', () => {
    let listener: net.Server;
    let port: number;

    beforeAll(async () => {
        listener = net.createServer((socket) => socket.end());
        await new Promise<void>((resolve) => listener.listen(0, '127.0.0.1', resolve));
        const address = listener.address();
        port = typeof address === 'object' && address ? address.port : 0;
    });

    afterAll(async () => {
        await new Promise<void>((resolve) => listener.close(() => resolve()));
    });

    it('reports an accepting port as open', async () => {
        const result = await checkPort('127.0.0.1', port, 2_000, new CancellationToken());
        expect(result).toMatchObject({ host: '127.0.0.1', port, open: true });
        expect(result.error).toBeUndefined();
    });

    it('reports a port nobody listens on as closed', async () => {
        const probe = net.createServer();
        await new Promise<void>((resolve) => probe.listen(0, '127.0.0.1', resolve));
        const address = probe.address();
        const freePort = typeof address === 'object' && address ? address.port : 0;
        await new Promise<void>((resolve) => probe.close(() => resolve()));

        const result = await checkPort('127.0.0.1', freePort, 2_000, new CancellationToken());
        expect(result).toMatchObject({ host: '127.0.0.1', port: freePort, open: false });
        expect(result.error).toContain('ECONNREFUSED');
    });

    it('refuses to start with a cancelled token', () => {
        const token = new CancellationToken();
        token.cancel();
        expect(() => checkPort('127.0.0.1', port, 2_000, token)).toThrow(TaskCancelledError);
    });
});

describe('runShellCommand', () => {
    const node = `"${process.execPath}"`;

    it('returns output and exit code', async () => {
        const result = await runShellCommand('echo hello', { timeoutMs: 5_000 }, new CancellationToken());
        expect(result.exitCode).toBe(0);
        expect(result.stdout.trim()).toBe('hello');
        expect(result.truncated).toBe(false);
    });

    it('reports a non-zero exit code', async () => {
        const result = await runShellCommand('exit 3', { timeoutMs: 5_000 }, new CancellationToken());
        expect(result.exitCode).toBe(3);
    });

    it('keeps a multibyte character split across writes intact', async () => {
        const script =
            'process.stdout.write(Buffer.from([0xc3])); setTimeout(() => process.stdout.write(Buffer.from([0xa9])), 50)';
        const result = await runShellCommand(`${node} -e "${script}"`, { timeoutMs: 5_000 }, new CancellationToken());
        expect(result.stdout).toBe('é');
    });

    it('rejects when the command outlives its timeout', async () => {
        const command = `${node} -e "setTimeout(() => {}, 10000)"`;
        await expect(runShellCommand(command, { timeoutMs: 200 }, new CancellationToken())).rejects.toThrow(
            'Shell command timed out after 200ms'
        );
    });

    it('kills the command and rejects with TaskCancelledError on cancel', async () => {
        const token = new CancellationToken();
        const command = `${node} -e "setTimeout(() => {}, 10000)"`;
        const running = runShellCommand(command, { timeoutMs: 20_000 }, token);
        setTimeout(() => token.cancel(), 100);
        await expect(running).rejects.toThrow('Shell command cancelled');
        await expect(running).rejects.toBeInstanceOf(TaskCancelledError);
    });

    it('refuses to start with a cancelled token', () => {
        const token = new CancellationToken();
        token.cancel();
        expect(() => runShellCommand('echo never', { timeoutMs: 1_000 }, token)).toThrow(TaskCancelledError);
    });
});
