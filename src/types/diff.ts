/**
 * Diff 相关类型定义
 *
 * 用于基于零上下文 diff 的增量格式化：仅对变更行调用格式化工具。
 * 行号以「新文件」为基准（diff 中 +++ 一侧）。
 */

/**
 * 文件标识：相对路径 + diff index 行中「新文件」一侧的 blob 标识
 * blob 标识只用于相等比较与查找，不做解析
 */
export interface FileKey {
    /** 去掉前缀后的相对路径（相对仓库根目录） */
    path: string;
    /** index 行 `abc..def` 中的 def */
    blobId: string;
}

/** 一段变更行范围（从 1 开始，闭区间，start <= end） */
export interface LineRange {
    start: number;
    end: number;
}

/** 单个文件累积的变更行范围（按 diff 中出现的顺序，不排序不合并） */
export interface FileHunks {
    key: FileKey;
    ranges: LineRange[];
}

/**
 * 文件内容的字符串编码：latin1 下每个字符恰好对应一个字节，
 * 读取、传给格式化工具、写回都用它，变更范围以外的字节原样保留（即使不是合法 UTF-8）
 */
export const CONTENT_ENCODING: BufferEncoding = 'latin1';

/** 跳过格式化的原因；null 表示已调用格式化工具 */
export type SkipReason = 'unsupported_extension' | 'ignored';

/** 单文件格式化结果：每次运行每个 FileKey 只产生一次，立即交给输出策略消费 */
export interface RunResult {
    key: FileKey;
    before: string;
    after: string;
    skipped: SkipReason | null;
}
