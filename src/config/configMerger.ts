/**
 * 配置合并：默认值 -> 配置文件 -> 命令行，固定顺序，产出不可变的 FormatConfig。
 */

import type { FormatConfig, FormatConfigOverrides, HunkfmtFileConfig } from '../types/config';

export const DEFAULT_BINARY = 'clang-format';

/** 拆分逗号分隔的 glob 列表，去掉空项 */
export const splitPatterns = (value: string | readonly string[] | undefined): string[] => {
    if (value === undefined) {
        return [];
    }
    const items = typeof value === 'string' ? value.split(',') : value;
    return items.map(item => item.trim()).filter(item => item.length > 0);
};

export const getDefaultFileConfig = (): Required<HunkfmtFileConfig> => ({
    binary: DEFAULT_BINARY,
    ignore: [],
});

/**
 * 合并三层配置；后一层只覆盖它显式给出的键
 *
 * @param sourcePath - 配置文件路径（仅用于日志），未找到时为 null
 */
export const mergeConfig = (
    fileConfig: HunkfmtFileConfig,
    overrides: FormatConfigOverrides,
    sourcePath: string | null
): FormatConfig => {
    const defaults = getDefaultFileConfig();
    const binary = overrides.binary ?? fileConfig.binary ?? defaults.binary;
    const ignore = overrides.ignore !== undefined
        ? splitPatterns(overrides.ignore)
        : splitPatterns(fileConfig.ignore ?? defaults.ignore);

    return Object.freeze({
        binary,
        ignorePatterns: Object.freeze(ignore),
        sourcePath,
    });
};
