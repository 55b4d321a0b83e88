/**
 * 命令依赖上下文
 *
 * 由 cli 入口构造并传入各命令，避免命令内直接依赖全局变量与进程对象。
 */

import { resolveFormatConfig } from '../config/configResolver';
import { ContentSource } from '../core/contentSource';
import { FormatInvoker } from '../core/formatInvoker';
import { ReformatEngine } from '../core/reformatEngine';
import type { FormatConfigOverrides } from '../types/config';
import { isKnownError } from '../types/errors';
import type { KnownError } from '../types/errors';
import type { DiffTarget } from '../utils/gitClient';
import type { Logger } from '../utils/logger';
import type { ProcessRunner } from '../utils/processRunner';

/** 命令用到的 git 能力（GitClient 实现） */
export interface GitOperations {
    getTopLevel(): Promise<string>;
    getDiff(target: DiffTarget, paths?: readonly string[]): Promise<string>;
    readBlob(blobId: string): Promise<string | null>;
    getUnstagedFiles(): Promise<string[]>;
    commitAmend(): Promise<void>;
    commitFixup(): Promise<void>;
}

export interface CommandOptions {
    /** diff 文件头需要去掉的路径段数 */
    stripCount: number;
    overrides: FormatConfigOverrides;
    /** 跳过未暂存修改检查 */
    force: boolean;
    /** 传给 git diff 的 pathspec */
    paths: string[];
}

export interface CommandContext {
    git: GitOperations;
    runProcess: ProcessRunner;
    logger: Logger;
    options: CommandOptions;
    /** 用户目录（~/.hunkfmt.yaml 所在目录），测试中可替换 */
    homeDir?: string;
}

/** 命令执行结果：成功时带退出码与 stdout 输出，失败时带已知错误 */
export type CommandResult =
    | { ok: true; exitCode: number; output: string }
    | { ok: false; error: KnownError };

/** 组装引擎：配置每个文件单独解析，命令行覆盖项最后应用 */
export const createEngine = (deps: CommandContext, topLevel: string): ReformatEngine =>
    new ReformatEngine({
        topLevel,
        contentSource: new ContentSource(deps.git, topLevel),
        resolveConfig: filePath => resolveFormatConfig({
            filePath,
            topLevel,
            overrides: deps.options.overrides,
            homeDir: deps.homeDir,
        }),
        formatter: new FormatInvoker(deps.runProcess, topLevel),
    });

/** 执行命令主体，把已知错误转成失败结果；未知错误继续抛出 */
export const toCommandResult = async (
    body: () => Promise<{ exitCode: number; output: string }>
): Promise<CommandResult> => {
    try {
        const { exitCode, output } = await body();
        return { ok: true, exitCode, output };
    } catch (error) {
        if (isKnownError(error)) {
            return { ok: false, error };
        }
        throw error;
    }
};
