/**
 * 配置加载（仅读 YAML 并校验结构，不合并）
 *
 * 供 configResolver 在找到 .hunkfmt.yaml 后调用。
 */

import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { InvalidConfigError } from '../types/errors';
import type { HunkfmtFileConfig } from '../types/config';

/** 配置文件 Schema：未知键忽略，空文件视为空配置 */
export const FileConfigSchema = z.object({
    binary: z.string().min(1, 'binary 不能为空').optional(),
    ignore: z.union([z.string(), z.array(z.string())]).optional(),
}).passthrough();

const formatZodError = (error: z.ZodError): string =>
    error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');

/**
 * 从给定路径读取 YAML 配置
 *
 * @throws InvalidConfigError 读取失败、YAML 语法错误或字段类型不符
 */
export const loadYamlFromPath = async (configPath: string): Promise<HunkfmtFileConfig> => {
    let raw: unknown;
    try {
        const fileContent = await fs.promises.readFile(configPath, 'utf-8');
        raw = yaml.load(fileContent);
    } catch (error) {
        throw new InvalidConfigError(configPath, error instanceof Error ? error.message : String(error));
    }
    if (raw === undefined || raw === null) {
        return {};
    }
    const parsed = FileConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new InvalidConfigError(configPath, formatZodError(parsed.error));
    }
    return { binary: parsed.data.binary, ignore: parsed.data.ignore };
};
