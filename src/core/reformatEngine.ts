/**
 * 格式化引擎
 *
 * 对解析出的每个文件依次执行：读取格式化前内容 -> 解析配置 -> 跳过或调用格式化工具 -> 产出结果。
 * 严格串行：一个文件完成后才处理下一个；任何一步失败都中止整个运行并向上抛出。
 */

import * as path from 'path';
import type { FileHunks, RunResult } from '../types/diff';
import { Logger } from '../utils/logger';
import { getSkipReason } from './formatInvoker';
import type { ReformatEngineDeps } from './reformatEngine.types';

export class ReformatEngine {
    private logger: Logger;

    constructor(private readonly deps: ReformatEngineDeps) {
        this.logger = new Logger('ReformatEngine');
    }

    /**
     * 按 Map 的迭代顺序逐个产出结果
     *
     * 每个 FileKey 只读取一次内容、只调用一次格式化工具（同一文件的所有范围一并传入）。
     */
    async *run(hunks: ReadonlyMap<string, FileHunks>): AsyncGenerator<RunResult> {
        const { topLevel, contentSource, resolveConfig, formatter } = this.deps;
        this.logger.info(`待处理文件数: ${hunks.size}`);

        for (const { key, ranges } of hunks.values()) {
            const before = await contentSource.read(key);
            const config = await resolveConfig(path.join(topLevel, key.path));
            const skipped = getSkipReason(key.path, config);

            if (skipped !== null) {
                this.logger.info(`跳过 ${key.path} (${skipped})`);
                yield { key, before, after: before, skipped };
                continue;
            }

            this.logger.info(`格式化 ${key.path}，范围 ${ranges.map(r => `${r.start}-${r.end}`).join(', ')}`);
            const after = await formatter.format({ path: key.path, before, ranges, config });
            yield { key, before, after, skipped: null };
        }
    }
}
