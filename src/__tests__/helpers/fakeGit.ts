/**
 * 内存版 git 与进程执行器
 *
 * 命令层与引擎测试用：不启动任何进程，记录调用并按预设返回。
 */

import { vi } from 'vitest';
import type { DiffTarget } from '../../utils/gitClient';
import type { ProcessOutput, RunOptions } from '../../utils/processRunner';

export interface FakeGitState {
    topLevel: string;
    diff?: string;
    blobs?: Record<string, string>;
    unstaged?: string[];
}

export const createFakeGit = (state: FakeGitState) => ({
    getTopLevel: vi.fn(async (): Promise<string> => state.topLevel),
    getDiff: vi.fn(async (_target: DiffTarget, _paths?: readonly string[]): Promise<string> => state.diff ?? ''),
    readBlob: vi.fn(async (blobId: string): Promise<string | null> => state.blobs?.[blobId] ?? null),
    getUnstagedFiles: vi.fn(async (): Promise<string[]> => state.unstaged ?? []),
    commitAmend: vi.fn(async (): Promise<void> => undefined),
    commitFixup: vi.fn(async (): Promise<void> => undefined),
});

/** 格式化工具替身：handler 根据命令与 stdin 返回 stdout */
export const createFakeRunner = (
    handler: (command: readonly string[], options: RunOptions) => string | ProcessOutput
) =>
    vi.fn(async (command: readonly string[], options: RunOptions = {}): Promise<ProcessOutput> => {
        const output = handler(command, options);
        return typeof output === 'string' ? { stdout: output, stderr: '' } : output;
    });
