/**
 * Git 交互
 *
 * 这个文件负责与 Git 交互，为格式化流程提供：
 * 1. 仓库根目录
 * 2. 零上下文 diff（工作区 / 暂存区 / 指定提交）
 * 3. 按 blob 标识读取内容
 * 4. 未暂存文件列表（amend/fixup 前的检查）
 * 5. amend 提交与 fixup 提交
 *
 * 所有命令通过 ProcessRunner 执行，不经过 shell，路径参数无需转义。
 */

import type { ProcessRunner } from './processRunner';
import { CONTENT_ENCODING } from '../types/diff';
import { ExternalCommandError } from '../types/errors';
import { Logger } from './logger';

/** diff 基准：工作区（相对暂存区）、暂存区（相对 HEAD）、或指定提交 */
export type DiffTarget = 'working' | 'staged' | { base: string };

const UNKNOWN_OBJECT_PATTERN = /Not a valid object name|bad file|could not get object info/i;
const ZERO_OBJECT_ID = /^0+$/;

export const DIFF_FORMAT_ARGS: readonly string[] = [
    '-U0',
    '--no-color',
    '--no-ext-diff',
    '--src-prefix=a/',
    '--dst-prefix=b/',
    '--no-relative',
];

const splitLines = (stdout: string): string[] =>
    stdout
        .split('\n')
        .map(line => line.trim())
        .filter(line => line.length > 0);

export class GitClient {
    private logger: Logger;

    constructor(
        private readonly run: ProcessRunner,
        private readonly cwd: string = process.cwd()
    ) {
        this.logger = new Logger('GitClient');
    }

    /** git rev-parse --show-toplevel */
    async getTopLevel(): Promise<string> {
        const { stdout } = await this.run(['git', 'rev-parse', '--show-toplevel'], { cwd: this.cwd });
        return stdout.trim();
    }

    /**
     * 获取零上下文 diff 原始文本
     *
     * - working: git diff（工作区相对暂存区）
     * - staged: git diff --cached
     * - { base }: git diff <base>（工作区相对该提交）
     *
     * @param paths - 可选 pathspec，只取这些路径的 diff
     */
    async getDiff(target: DiffTarget, paths: readonly string[] = []): Promise<string> {
        // 路径前缀固定为 a/ b/ 且相对仓库根目录，不受 diff.noprefix / diff.relative 等用户配置影响
        const command = ['git', 'diff', ...DIFF_FORMAT_ARGS];
        if (target === 'staged') {
            command.push('--cached');
        } else if (target !== 'working') {
            command.push(target.base);
        }
        if (paths.length > 0) {
            command.push('--', ...paths);
        }
        this.logger.debug(`执行: ${command.join(' ')}`);
        const { stdout } = await this.run(command, { cwd: this.cwd });
        return stdout;
    }

    /**
     * 按 blob 标识读取内容
     *
     * @returns 对象库中不存在该标识时返回 null；其他失败照常抛出
     */
    async readBlob(blobId: string): Promise<string | null> {
        if (ZERO_OBJECT_ID.test(blobId)) {
            return null;
        }
        try {
            const { stdout } = await this.run(['git', 'cat-file', 'blob', blobId], {
                cwd: this.cwd,
                encoding: CONTENT_ENCODING,
            });
            return stdout;
        } catch (error) {
            if (error instanceof ExternalCommandError && UNKNOWN_OBJECT_PATTERN.test(error.stderr)) {
                this.logger.debug(`对象库中没有 ${blobId}`);
                return null;
            }
            throw error;
        }
    }

    /** 已修改但未暂存的文件（相对仓库根目录） */
    async getUnstagedFiles(): Promise<string[]> {
        const { stdout } = await this.run(['git', 'diff', '--name-only'], { cwd: this.cwd });
        return splitLines(stdout);
    }

    /** 将当前修改并入最近一次提交 */
    async commitAmend(): Promise<void> {
        await this.run(['git', 'commit', '--all', '--amend', '--no-edit'], { cwd: this.cwd });
    }

    /** 为最近一次提交创建 fixup 提交 */
    async commitFixup(): Promise<void> {
        await this.run(['git', 'commit', '--all', '--fixup=HEAD'], { cwd: this.cwd });
    }
}
