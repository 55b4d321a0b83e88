/**
 * Diff 报告输出
 *
 * 对 before !== after 的文件生成 unified diff 并拼接，不写磁盘。
 * 空字符串表示没有格式差异。报告按 CONTENT_ENCODING 编码，输出时需按同一编码转成字节。
 */

import { createTwoFilesPatch } from 'diff';
import { CONTENT_ENCODING } from '../types/diff';
import type { RunResult } from '../types/diff';

export const BEFORE_LABEL = 'before formatting';
export const AFTER_LABEL = 'after formatting';

/** 单个文件的 unified diff；无差异时返回空字符串 */
export const renderFileDiff = (result: RunResult): string => {
    if (result.before === result.after) {
        return '';
    }
    // 内容按 CONTENT_ENCODING 逐字节保存，路径也转成同一编码，整个报告才能按字节输出
    const fileName = Buffer.from(result.key.path, 'utf-8').toString(CONTENT_ENCODING);
    return createTwoFilesPatch(
        fileName,
        fileName,
        result.before,
        result.after,
        BEFORE_LABEL,
        AFTER_LABEL
    );
};

/** 消费全部结果并拼接 diff，去掉末尾空行 */
export const renderDiffReport = async (
    results: AsyncIterable<RunResult> | Iterable<RunResult>
): Promise<string> => {
    const parts: string[] = [];
    for await (const result of results) {
        const patch = renderFileDiff(result);
        if (patch) {
            parts.push(patch);
        }
    }
    return parts.join('').replace(/(\r?\n)+$/, '');
};
