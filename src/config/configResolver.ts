/**
 * 格式化配置解析
 *
 * 从文件所在目录开始逐级向上查找 .hunkfmt.yaml：
 * - 找到第一个即停止
 * - 仓库根目录检查完（含）或到达文件系统根目录后停止，绝不越过仓库根目录
 * - 都没有时回退到 ~/.hunkfmt.yaml，再没有则使用默认值
 * 命令行覆盖项最后应用。每个文件单独解析，不做缓存（子目录可以有自己的配置）。
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { minimatch } from 'minimatch';
import { loadYamlFromPath } from './configLoader';
import { mergeConfig } from './configMerger';
import type { FormatConfig, FormatConfigOverrides } from '../types/config';

export const CONFIG_FILENAME = '.hunkfmt.yaml';

export interface ResolveConfigParams {
    /** 文件绝对路径 */
    filePath: string;
    /** 仓库根目录 */
    topLevel: string;
    overrides: FormatConfigOverrides;
    /** 用户目录，默认 os.homedir() */
    homeDir?: string;
    existsSync?: (targetPath: string) => boolean;
}

const isWithin = (root: string, target: string): boolean => {
    const relative = path.relative(root, target);
    return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
};

/**
 * 查找生效的配置文件路径
 *
 * @returns 配置文件路径；仓库内与用户目录都没有时返回 null
 */
export const findConfigFile = (
    filePath: string,
    topLevel: string,
    homeDir: string = os.homedir(),
    existsSync: (targetPath: string) => boolean = fs.existsSync
): string | null => {
    const root = path.resolve(topLevel);
    let currentPath = path.dirname(path.resolve(filePath));

    while (isWithin(root, currentPath)) {
        const candidate = path.join(currentPath, CONFIG_FILENAME);
        if (existsSync(candidate)) {
            return candidate;
        }
        const parent = path.dirname(currentPath);
        if (currentPath === root || parent === currentPath) {
            break;
        }
        currentPath = parent;
    }

    const userConfig = path.join(homeDir, CONFIG_FILENAME);
    return existsSync(userConfig) ? userConfig : null;
};

/** 解析单个文件的 FormatConfig：默认值 -> 配置文件 -> 命令行 */
export const resolveFormatConfig = async (params: ResolveConfigParams): Promise<FormatConfig> => {
    const configPath = findConfigFile(params.filePath, params.topLevel, params.homeDir, params.existsSync);
    const fileConfig = configPath ? await loadYamlFromPath(configPath) : {};
    return mergeConfig(fileConfig, params.overrides, configPath);
};

/**
 * 检查相对路径是否命中任一忽略模式
 *
 * shell glob 语义（minimatch）：* 不跨越 /，vendor/* 不匹配 vendor/sub/foo.cpp
 */
export const isIgnored = (relativePath: string, patterns: readonly string[]): boolean => {
    const normalizedPath = relativePath.replace(/\\/g, '/');
    return patterns.some(pattern => minimatch(normalizedPath, pattern.replace(/\\/g, '/'), { dot: true }));
};
