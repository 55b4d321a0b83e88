/**
 * processRunner 单元测试
 *
 * 通过 mock child_process.spawn 模拟子进程，不真正启动进程。
 */

import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { beforeEach, describe, expect, it, vi } from 'vitest';

const { spawnMock } = vi.hoisted(() => ({
    spawnMock: vi.fn(),
}));

vi.mock('child_process', () => ({
    spawn: spawnMock,
}));

import { runProcess } from '../../utils/processRunner';
import { ExternalCommandError, ProcessLaunchError } from '../../types/errors';

class FakeChild extends EventEmitter {
    stdout = new PassThrough();
    stderr = new PassThrough();
    stdin = new PassThrough();
    private receivedChunks: Buffer[] = [];

    constructor() {
        super();
        this.stdin.on('data', (chunk: Buffer) => {
            this.receivedChunks.push(chunk);
        });
    }

    get received(): Buffer {
        return Buffer.concat(this.receivedChunks);
    }
}

/** 下一次 spawn 返回的子进程在 stdin 关闭后按给定结果结束 */
const scheduleChild = (result: {
    stdout?: string | Buffer;
    stderr?: string;
    exitCode?: number;
    error?: NodeJS.ErrnoException;
}) => {
    const child = new FakeChild();
    child.stdin.on('finish', () => {
        setImmediate(() => {
            if (result.error) {
                child.emit('error', result.error);
                return;
            }
            if (result.stdout) child.stdout.emit('data', typeof result.stdout === 'string' ? Buffer.from(result.stdout) : result.stdout);
            if (result.stderr) child.stderr.emit('data', Buffer.from(result.stderr));
            child.emit('close', result.exitCode ?? 0);
        });
    });
    spawnMock.mockReturnValueOnce(child);
    return child;
};

describe('runProcess', () => {
    beforeEach(() => {
        spawnMock.mockReset();
    });

    it('写入 stdin 并收集 stdout', async () => {
        const child = scheduleChild({ stdout: 'int x;\n' });

        const output = await runProcess(['clang-format', '-lines=1:1'], { input: 'int  x;\n', cwd: '/repo' });

        expect(output).toEqual({ stdout: 'int x;\n', stderr: '' });
        expect(child.received.toString('utf-8')).toBe('int  x;\n');
        expect(spawnMock).toHaveBeenCalledWith('clang-format', ['-lines=1:1'], {
            cwd: '/repo',
            stdio: ['pipe', 'pipe', 'pipe'],
        });
    });

    it('latin1 编码下 stdin 与 stdout 逐字节传递，非 UTF-8 字节不被替换', async () => {
        // "// é\n" 的 latin1 字节，0xe9 单独出现不是合法的 UTF-8
        const bytes = Buffer.from([0x2f, 0x2f, 0x20, 0xe9, 0x0a]);
        const child = scheduleChild({ stdout: bytes });

        const output = await runProcess(['clang-format'], { input: '// \u00e9\n', encoding: 'latin1' });

        expect(child.received.equals(bytes)).toBe(true);
        expect(output.stdout).toBe('// \u00e9\n');
        expect(Buffer.from(output.stdout, 'latin1').equals(bytes)).toBe(true);
    });

    it('默认按 UTF-8 解码 stdout', async () => {
        scheduleChild({ stdout: Buffer.from('// é\n', 'utf-8') });

        await expect(runProcess(['git', 'show'])).resolves.toEqual({ stdout: '// é\n', stderr: '' });
    });

    it('退出码非 0 时抛出 ExternalCommandError，带退出码与 stderr', async () => {
        scheduleChild({ stderr: 'error: bad style\n', exitCode: 3 });

        const promise = runProcess(['clang-format']);

        await expect(promise).rejects.toBeInstanceOf(ExternalCommandError);
        await expect(promise).rejects.toMatchObject({
            kind: 'external_command',
            exitCode: 3,
            stderr: 'error: bad style\n',
            command: ['clang-format'],
        });
    });

    it('可执行文件不存在时抛出 ProcessLaunchError', async () => {
        const error: NodeJS.ErrnoException = new Error('spawn missing-format ENOENT');
        error.code = 'ENOENT';
        scheduleChild({ error });

        await expect(runProcess(['missing-format'])).rejects.toMatchObject({
            kind: 'process_launch',
            code: 'ENOENT',
            command: ['missing-format'],
        });
    });

    it('其他启动错误原样抛出', async () => {
        const error: NodeJS.ErrnoException = new Error('spawn EMFILE');
        error.code = 'EMFILE';
        scheduleChild({ error });

        await expect(runProcess(['clang-format'])).rejects.toBe(error);
    });

    it('空命令直接抛出 ProcessLaunchError', async () => {
        await expect(runProcess([])).rejects.toBeInstanceOf(ProcessLaunchError);
        expect(spawnMock).not.toHaveBeenCalled();
    });
});
