/**
 * 命令：diff 检查（默认模式）
 *
 * 从 stdin 读取零上下文 diff，输出格式化前后的 unified diff，不写磁盘。
 * 有差异时退出码为 1。
 */

import { renderDiffReport } from '../output/diffReport';
import { parseHunks } from '../utils/diffParser';
import { createEngine, toCommandResult } from './commandContext';
import type { CommandContext, CommandResult } from './commandContext';

export const runDiffCheckCommand = (deps: CommandContext, diffText: string): Promise<CommandResult> =>
    toCommandResult(async () => {
        const { git, logger, options } = deps;
        const topLevel = await git.getTopLevel();
        const hunks = parseHunks(diffText, { stripCount: options.stripCount });
        logger.info(`diff 中共有 ${hunks.size} 个文件包含新增行`);

        const report = await renderDiffReport(createEngine(deps, topLevel).run(hunks));
        if (!report) {
            logger.info('没有格式差异');
            return { exitCode: 0, output: '' };
        }
        return { exitCode: 1, output: `${report}\n` };
    });
