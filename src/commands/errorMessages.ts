/**
 * 已知错误 -> 用户提示与退出码
 */

import type { KnownError } from '../types/errors';

/** 格式化工具或 git 自身的退出码原样透传；0 或被信号终止时使用 1 */
export const getExitCode = (error: KnownError): number => {
    if (error.kind === 'external_command') {
        return error.exitCode !== null && error.exitCode !== 0 ? error.exitCode : 1;
    }
    return 1;
};

export const describeError = (error: KnownError): string => {
    switch (error.kind) {
        case 'unstaged_guard':
            return [
                '存在未暂存的修改，已中止（使用 --force 跳过检查）:',
                ...error.files.map(file => `  ${file}`),
            ].join('\n');
        case 'process_launch':
            return `无法执行 ${error.command[0] ?? ''} (${error.code})，请检查路径与执行权限`;
        case 'external_command':
            return error.stderr.trimEnd() || `命令执行失败: ${error.command.join(' ')}`;
        case 'path_not_found':
            return `找不到文件 ${error.path}\n提示: diff 的路径前缀可能与 -p/--strip 不一致`;
        case 'invalid_diff':
            return `${error.message}\n提示: diff 的路径前缀可能与 -p/--strip 不一致`;
        case 'invalid_config':
            return `配置文件无效 ${error.configPath}: ${error.detail}`;
        case 'file_write':
            return `无法写入 ${error.path} (${error.code})`;
    }
};
