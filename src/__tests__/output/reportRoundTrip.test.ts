/**
 * DiffReport 与 InPlaceWriter 一致性测试
 *
 * 把每个文件的 diff 作为补丁应用到格式化前内容上，结果应与原地写回的文件内容相同。
 */

import { applyPatch } from 'diff';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { renderFileDiff } from '../../output/diffReport';
import { writeInPlace } from '../../output/inPlaceWriter';
import type { RunResult } from '../../types/diff';
import { createTempFileSystem } from '../helpers/tempFileSystem';
import type { TempFileSystem } from '../helpers/tempFileSystem';

const result = (path: string, before: string, after: string): RunResult => ({
    key: { path, blobId: 'abc1234' },
    before,
    after,
    skipped: null,
});

describe('DiffReport 补丁与原地写回结果一致', () => {
    let tfs: TempFileSystem;

    beforeEach(async () => {
        tfs = await createTempFileSystem();
    });

    afterEach(async () => {
        await tfs.cleanup();
    });

    const results: RunResult[] = [
        result('src/a.cpp', 'int  a;\nint b;\nint  c;\n', 'int a;\nint b;\nint c;\n'),
        result('src/no_newline.cpp', 'int x;\nint  y;', 'int x;\nint y;'),
        result('src/same.cpp', 'int s;\n', 'int s;\n'),
        result('src/latin1.cpp', '// é\nint  z;\n', '// é\nint z;\n'),
    ];

    it.each(results.map((item): [string, RunResult] => [item.key.path, item]))('%s', async (filePath, item) => {
        await tfs.createFile(filePath, Buffer.from(item.before, 'latin1'));
        await writeInPlace([item], tfs.getTempDir());
        const written = await tfs.readFile(filePath, 'latin1');

        const patch = renderFileDiff(item);
        const patched = patch ? applyPatch(item.before, patch) : item.before;

        expect(patched).toBe(written);
        expect(written).toBe(item.after);
    });
});
