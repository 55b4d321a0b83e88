/**
 * 错误类型定义
 *
 * 封闭的错误集合：每个错误带 kind 判别字段与生成提示所需的结构化数据，
 * 命令层据此决定提示文案与退出码，而不是解析 message 字符串。
 */

export type HunkfmtErrorKind =
    | 'unstaged_guard'
    | 'process_launch'
    | 'external_command'
    | 'path_not_found'
    | 'invalid_diff'
    | 'invalid_config'
    | 'file_write';

export abstract class HunkfmtError extends Error {
    abstract readonly kind: HunkfmtErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** 存在未暂存修改，阻止改写历史的模式（可用 --force 跳过） */
export class UnstagedGuardError extends HunkfmtError {
    readonly kind = 'unstaged_guard' as const;

    constructor(readonly files: readonly string[]) {
        super(`存在未暂存的修改: ${files.join(', ')}`);
    }
}

/** 目标可执行文件不存在或无执行权限 */
export class ProcessLaunchError extends HunkfmtError {
    readonly kind = 'process_launch' as const;

    constructor(
        readonly command: readonly string[],
        readonly code: string
    ) {
        super(`无法启动进程 ${command[0] ?? ''} (${code})`);
    }
}

/** 子进程（格式化工具或 git）以非 0 退出，或格式化工具输出了 stderr */
export class ExternalCommandError extends HunkfmtError {
    readonly kind = 'external_command' as const;

    constructor(
        readonly command: readonly string[],
        readonly exitCode: number | null,
        readonly stderr: string
    ) {
        super(`命令执行失败 (exit ${exitCode ?? 'signal'}): ${command.join(' ')}`);
    }
}

/** 工作区回退读取失败 */
export class PathNotFoundError extends HunkfmtError {
    readonly kind = 'path_not_found' as const;

    constructor(readonly path: string) {
        super(`文件不存在: ${path}`);
    }
}

/** diff 中出现了无法归属到文件的 hunk */
export class InvalidDiffError extends HunkfmtError {
    readonly kind = 'invalid_diff' as const;

    constructor(
        readonly line: string,
        readonly lineNumber: number
    ) {
        super(`第 ${lineNumber} 行的 hunk 之前没有可用的文件头: ${line}`);
    }
}

/** 配置文件无法读取或格式不正确 */
export class InvalidConfigError extends HunkfmtError {
    readonly kind = 'invalid_config' as const;

    constructor(
        readonly configPath: string,
        readonly detail: string
    ) {
        super(`配置文件无效: ${configPath}: ${detail}`);
    }
}

/** 写回工作区文件失败 */
export class FileWriteError extends HunkfmtError {
    readonly kind = 'file_write' as const;

    constructor(
        readonly path: string,
        readonly code: string
    ) {
        super(`写入文件失败: ${path} (${code})`);
    }
}

export type KnownError =
    | UnstagedGuardError
    | ProcessLaunchError
    | ExternalCommandError
    | PathNotFoundError
    | InvalidDiffError
    | InvalidConfigError
    | FileWriteError;

export const isKnownError = (error: unknown): error is KnownError =>
    error instanceof HunkfmtError;
