/**
 * 子进程执行
 *
 * 所有外部进程（格式化工具、git）都经由这里启动，其余模块不直接接触 child_process。
 * 进程启动失败抛 ProcessLaunchError；退出码非 0 抛 ExternalCommandError。
 */

import { spawn } from 'child_process';
import { ExternalCommandError, ProcessLaunchError } from '../types/errors';

export interface RunOptions {
    /** 写入子进程 stdin 的内容；不传则立即关闭 stdin */
    input?: string;
    cwd?: string;
    /** stdin 与 stdout 的编码，默认 utf-8；stderr 始终按 utf-8 解码 */
    encoding?: BufferEncoding;
}

export interface ProcessOutput {
    stdout: string;
    stderr: string;
}

/** 执行命令；command[0] 为可执行文件，其余为参数（不经过 shell） */
export type ProcessRunner = (command: readonly string[], options?: RunOptions) => Promise<ProcessOutput>;

const LAUNCH_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'ENOTDIR']);

export const runProcess: ProcessRunner = (command, options = {}) =>
    new Promise<ProcessOutput>((resolve, reject) => {
        const [file, ...args] = command;
        const encoding = options.encoding ?? 'utf-8';
        if (!file) {
            reject(new ProcessLaunchError(command, 'ENOENT'));
            return;
        }
        const child = spawn(file, args, {
            cwd: options.cwd,
            stdio: ['pipe', 'pipe', 'pipe'],
        });
        const stdoutChunks: Buffer[] = [];
        const stderrChunks: Buffer[] = [];
        let settled = false;

        child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

        child.on('error', (error: NodeJS.ErrnoException) => {
            if (settled) return;
            settled = true;
            if (error.code && LAUNCH_ERROR_CODES.has(error.code)) {
                reject(new ProcessLaunchError(command, error.code));
            } else {
                reject(error);
            }
        });

        child.on('close', (exitCode: number | null) => {
            if (settled) return;
            settled = true;
            const stdout = Buffer.concat(stdoutChunks).toString(encoding);
            const stderr = Buffer.concat(stderrChunks).toString('utf-8');
            if (exitCode !== 0) {
                reject(new ExternalCommandError(command, exitCode, stderr));
                return;
            }
            resolve({ stdout, stderr });
        });

        // 子进程提前退出时写 stdin 会触发 EPIPE，以 close 事件的结果为准
        child.stdin.on('error', (error: NodeJS.ErrnoException) => {
            if (error.code === 'EPIPE' || settled) return;
            settled = true;
            reject(error);
        });
        child.stdin.end(Buffer.from(options.input ?? '', encoding));
    });
