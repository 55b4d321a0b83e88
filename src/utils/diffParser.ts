/**
 * Unified diff 解析器
 *
 * 将零上下文（-U0）的 git diff 输出解析为「文件 -> 变更行范围」映射。
 * 只关心三种行：index 头、+++ 文件头、@@ hunk 头，其余行一律跳过，不校验 diff 的整体结构。
 */

import { InvalidDiffError } from '../types/errors';
import type { FileHunks, FileKey, LineRange } from '../types/diff';

const INDEX_HEADER = /^index ([0-9a-fA-F]+)\.\.([0-9a-fA-F]+)(?: \d+)?$/;
const NEW_FILE_HEADER = /^\+\+\+ (.+?)(?:\t.*)?$/;
const HUNK_HEADER = /^@@ -\d+(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

/**
 * 解析状态机：
 * seeking_index -(index)-> seeking_filename -(+++)-> seeking_hunk -(@@)-> seeking_hunk
 * 任意状态遇到 index 头都回到 seeking_filename（下一个文件）。
 */
export type ParseState =
    | { name: 'seeking_index' }
    | { name: 'seeking_filename'; blobId: string }
    | { name: 'seeking_hunk'; blobId: string; path: string | null };

export interface ParseOptions {
    /** +++ 路径需要去掉的前缀段数（git 默认 b/ 前缀对应 1） */
    stripCount: number;
}

/** FileKey 的 Map 键；blob 标识在前，避免路径中的字符干扰 */
export const fileKeyId = (key: FileKey): string => `${key.blobId}:${key.path}`;

/**
 * 去掉路径前 stripCount 段；段数不足时返回 null
 *
 * @example stripPathPrefix('a/b/c/file.cpp', 1) // 'b/c/file.cpp'
 */
export const stripPathPrefix = (rawPath: string, stripCount: number): string | null => {
    if (stripCount <= 0) {
        return rawPath;
    }
    const segments = rawPath.split('/');
    if (segments.length <= stripCount) {
        return null;
    }
    return segments.slice(stripCount).join('/');
};

/**
 * 解析 diff 原始文本
 *
 * @param raw - git diff -U0 的完整输出
 * @returns 按首次出现顺序排列的 Map，值为该文件的全部变更行范围
 * @throws InvalidDiffError 新增行数大于 0 的 hunk 前没有可用的文件头
 */
export function parseHunks(raw: string, options: ParseOptions): Map<string, FileHunks> {
    const result = new Map<string, FileHunks>();
    const lines = raw.split(/\r?\n/);
    let state: ParseState = { name: 'seeking_index' };
    // 当前 hunk 尚未跳过的 +/- 内容行数，避免把内容行误判为文件头
    let pendingBodyLines = 0;

    const appendRange = (key: FileKey, range: LineRange) => {
        const id = fileKeyId(key);
        const existing = result.get(id);
        if (existing) {
            existing.ranges.push(range);
        } else {
            result.set(id, { key, ranges: [range] });
        }
    };

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];

        if (pendingBodyLines > 0) {
            if (line.startsWith('+') || line.startsWith('-')) {
                pendingBodyLines--;
                continue;
            }
            // "\ No newline at end of file"
            if (line.startsWith('\\')) {
                continue;
            }
        }
        pendingBodyLines = 0;

        const indexMatch = line.match(INDEX_HEADER);
        if (indexMatch) {
            state = { name: 'seeking_filename', blobId: indexMatch[2] };
            continue;
        }

        const fileMatch = line.match(NEW_FILE_HEADER);
        if (fileMatch) {
            if (state.name !== 'seeking_index') {
                state = {
                    name: 'seeking_hunk',
                    blobId: state.blobId,
                    path: stripPathPrefix(fileMatch[1], options.stripCount),
                };
            }
            continue;
        }

        const hunkMatch = line.match(HUNK_HEADER);
        if (hunkMatch) {
            const oldCount = parseInt(hunkMatch[1] ?? '1', 10);
            const start = parseInt(hunkMatch[2], 10);
            const count = parseInt(hunkMatch[3] ?? '1', 10);
            pendingBodyLines = oldCount + count;
            // 纯删除，新文件侧没有行
            if (count === 0) {
                continue;
            }
            if (state.name !== 'seeking_hunk' || state.path === null) {
                throw new InvalidDiffError(line, i + 1);
            }
            appendRange({ path: state.path, blobId: state.blobId }, { start, end: start + count - 1 });
        }
    }

    return result;
}
