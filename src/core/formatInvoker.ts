/**
 * 格式化工具调用
 *
 * 以 stdin 传入格式化前内容，用 -lines 把格式化限制在变更行范围内，stdout 即格式化后内容。
 * 不支持的扩展名与命中忽略模式的文件直接原样返回，不启动任何进程。
 */

import * as path from 'path';
import { isIgnored } from '../config/configResolver';
import { ExternalCommandError } from '../types/errors';
import type { FormatConfig } from '../types/config';
import { CONTENT_ENCODING } from '../types/diff';
import type { LineRange, SkipReason } from '../types/diff';
import type { ProcessRunner } from '../utils/processRunner';
import { Logger } from '../utils/logger';

/** 支持的扩展名（小写，不含点）：C/C++/Objective-C/Java/C#/JavaScript/TypeScript/Protobuf */
export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set([
    'c', 'h',
    'cc', 'cpp', 'cxx', 'c++', 'hh', 'hpp', 'hxx', 'h++', 'inc', 'ipp', 'inl',
    'm', 'mm',
    'java', 'cs',
    'js', 'mjs', 'cjs', 'jsx', 'ts', 'tsx',
    'proto', 'protodevel',
]);

export const isSupportedFile = (filePath: string): boolean => {
    const extension = path.extname(filePath).slice(1).toLowerCase();
    return SUPPORTED_EXTENSIONS.has(extension);
};

/** 返回跳过格式化的原因；需要格式化时返回 null */
export const getSkipReason = (filePath: string, config: FormatConfig): SkipReason | null => {
    if (!isSupportedFile(filePath)) {
        return 'unsupported_extension';
    }
    if (isIgnored(filePath, config.ignorePatterns)) {
        return 'ignored';
    }
    return null;
};

/** 组装格式化工具命令行：-style=file、-assume-filename、每个范围一个 -lines */
export const buildFormatCommand = (
    binary: string,
    filePath: string,
    ranges: readonly LineRange[]
): string[] => [
    binary,
    '-style=file',
    `-assume-filename=${filePath}`,
    ...ranges.map(range => `-lines=${range.start}:${range.end}`),
];

export interface FormatRequest {
    /** 相对仓库根目录的路径，仅用于让格式化工具推断语言与样式 */
    path: string;
    before: string;
    ranges: readonly LineRange[];
    config: FormatConfig;
}

export class FormatInvoker {
    private logger: Logger;

    constructor(
        private readonly run: ProcessRunner,
        private readonly topLevel: string
    ) {
        this.logger = new Logger('FormatInvoker');
    }

    /**
     * 格式化指定范围
     *
     * @throws ExternalCommandError 格式化工具非 0 退出或输出了 stderr
     * @throws ProcessLaunchError 格式化工具不存在或不可执行
     */
    async format(request: FormatRequest): Promise<string> {
        const skipReason = getSkipReason(request.path, request.config);
        if (skipReason !== null) {
            this.logger.debug(`跳过 ${request.path}: ${skipReason}`);
            return request.before;
        }

        const command = buildFormatCommand(request.config.binary, request.path, request.ranges);
        this.logger.debug(`执行: ${command.join(' ')}`);
        const { stdout, stderr } = await this.run(command, {
            input: request.before,
            cwd: this.topLevel,
            encoding: CONTENT_ENCODING,
        });
        if (stderr.length > 0) {
            throw new ExternalCommandError(command, 0, stderr);
        }
        return stdout;
    }
}
