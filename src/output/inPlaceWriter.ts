/**
 * 原地写回
 *
 * 仅当格式化结果与原内容不同时写回工作区文件；相同的文件完全不碰（不更新修改时间）。
 * 边消费边写：中途失败时已写入的文件不会回滚。
 */

import * as fs from 'fs';
import * as path from 'path';
import { CONTENT_ENCODING } from '../types/diff';
import type { RunResult } from '../types/diff';
import { FileWriteError, PathNotFoundError } from '../types/errors';
import { Logger } from '../utils/logger';

const logger = new Logger('InPlaceWriter');

const toWriteError = (filePath: string, error: unknown): FileWriteError | PathNotFoundError => {
    const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : 'UNKNOWN';
    if (code === 'ENOENT') {
        return new PathNotFoundError(filePath);
    }
    return new FileWriteError(filePath, code);
};

/**
 * @returns 是否有文件被修改
 * @throws PathNotFoundError 目标文件所在目录不存在
 * @throws FileWriteError 其他写入失败（权限、磁盘空间等）
 */
export const writeInPlace = async (
    results: AsyncIterable<RunResult> | Iterable<RunResult>,
    topLevel: string
): Promise<boolean> => {
    let changed = false;
    for await (const result of results) {
        if (result.before === result.after) {
            continue;
        }
        const filePath = path.join(topLevel, result.key.path);
        try {
            await fs.promises.writeFile(filePath, result.after, CONTENT_ENCODING);
        } catch (error) {
            logger.error(`写回失败: ${result.key.path}`, error);
            throw toWriteError(filePath, error);
        }
        logger.info(`已写回: ${result.key.path}`);
        changed = true;
    }
    return changed;
};
