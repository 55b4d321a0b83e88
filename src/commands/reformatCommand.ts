/**
 * 命令：原地格式化
 *
 * - working: 格式化工作区中相对暂存区的变更
 * - staged: 格式化暂存区中的变更，结果写回工作区
 * - amend / fixup: 先检查没有未暂存修改（--force 可跳过），格式化相对上一提交的变更，
 *   有文件被修改时再 amend 当前提交或创建 fixup 提交
 */

import { writeInPlace } from '../output/inPlaceWriter';
import { UnstagedGuardError } from '../types/errors';
import { parseHunks } from '../utils/diffParser';
import type { DiffTarget } from '../utils/gitClient';
import { createEngine, toCommandResult } from './commandContext';
import type { CommandContext, CommandResult } from './commandContext';

export type ReformatMode = 'working' | 'staged' | 'amend' | 'fixup';

const PARENT_COMMIT = 'HEAD^';

const getDiffTarget = (mode: ReformatMode): DiffTarget => {
    switch (mode) {
        case 'working':
            return 'working';
        case 'staged':
            return 'staged';
        case 'amend':
        case 'fixup':
            return { base: PARENT_COMMIT };
    }
};

const rewritesHistory = (mode: ReformatMode): boolean => mode === 'amend' || mode === 'fixup';

export const runReformatCommand = (deps: CommandContext, mode: ReformatMode): Promise<CommandResult> =>
    toCommandResult(async () => {
        const { git, logger, options } = deps;
        logger.info(`执行原地格式化: ${mode}`);

        if (rewritesHistory(mode) && !options.force) {
            const unstaged = await git.getUnstagedFiles();
            if (unstaged.length > 0) {
                throw new UnstagedGuardError(unstaged);
            }
        }

        const topLevel = await git.getTopLevel();
        const diffText = await git.getDiff(getDiffTarget(mode), options.paths);
        const hunks = parseHunks(diffText, { stripCount: options.stripCount });
        const changed = await writeInPlace(createEngine(deps, topLevel).run(hunks), topLevel);

        if (!changed) {
            logger.info('没有需要格式化的变更');
            return { exitCode: 0, output: '' };
        }

        if (mode === 'amend') {
            await git.commitAmend();
            logger.important('格式化结果已并入当前提交');
        } else if (mode === 'fixup') {
            await git.commitFixup();
            logger.important('已创建 fixup 提交');
        } else {
            logger.important('已格式化变更行');
        }
        return { exitCode: 0, output: '' };
    });
