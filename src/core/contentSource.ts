/**
 * 格式化前内容读取
 *
 * 优先按 blob 标识从 git 对象库读取（暂存区 / 提交中的版本）；
 * 对象库中不存在时（工作区 diff 的新侧 blob 通常不在库中），回退读取工作区文件。
 */

import * as fs from 'fs';
import * as path from 'path';
import { PathNotFoundError } from '../types/errors';
import { CONTENT_ENCODING } from '../types/diff';
import type { FileKey } from '../types/diff';
import { Logger } from '../utils/logger';

/** ContentSource 依赖的 git 能力（GitClient 的子集） */
export interface BlobReader {
    readBlob(blobId: string): Promise<string | null>;
}

export class ContentSource {
    private logger: Logger;

    constructor(
        private readonly git: BlobReader,
        private readonly topLevel: string
    ) {
        this.logger = new Logger('ContentSource');
    }

    /**
     * 读取文件格式化前的内容
     *
     * @throws PathNotFoundError 回退读取时工作区中不存在该文件
     */
    async read(key: FileKey): Promise<string> {
        const blob = await this.git.readBlob(key.blobId);
        if (blob !== null) {
            return blob;
        }

        const filePath = path.join(this.topLevel, key.path);
        this.logger.debug(`回退读取工作区文件: ${filePath}`);
        try {
            return await fs.promises.readFile(filePath, CONTENT_ENCODING);
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                throw new PathNotFoundError(filePath);
            }
            throw error;
        }
    }
}
