#!/usr/bin/env node
/**
 * hunkfmt 命令行入口
 *
 * 只格式化 diff 中变更过的行：解析参数 -> 选择模式 -> 执行命令 -> 按结果设置退出码。
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parseCliArgs, USAGE } from './commands/cliArgs';
import type { CommandContext, CommandResult } from './commands/commandContext';
import { runDiffCheckCommand } from './commands/diffCheckCommand';
import { describeError, getExitCode } from './commands/errorMessages';
import { runReformatCommand } from './commands/reformatCommand';
import { CONTENT_ENCODING } from './types/diff';
import { GitClient } from './utils/gitClient';
import { Logger } from './utils/logger';
import { runProcess } from './utils/processRunner';

const logger = new Logger('hunkfmt');

const readStdin = async (): Promise<string> => {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks).toString('utf-8');
};

const PackageJsonSchema = z.object({ version: z.string().optional() });

const readVersion = (): string => {
    const pkgPath = path.join(__dirname, '..', 'package.json');
    const pkg = PackageJsonSchema.safeParse(JSON.parse(fs.readFileSync(pkgPath, 'utf-8')));
    return (pkg.success ? pkg.data.version : undefined) ?? '0.0.0';
};

async function main(): Promise<number> {
    const parsed = parseCliArgs(process.argv.slice(2), !process.stdin.isTTY);
    if (!parsed.ok) {
        process.stderr.write(`hunkfmt: ${parsed.message}\n\n${USAGE}\n`);
        return 1;
    }
    const { args } = parsed;
    if (args.kind === 'help') {
        process.stdout.write(`${USAGE}\n`);
        return 0;
    }
    if (args.kind === 'version') {
        process.stdout.write(`hunkfmt v${readVersion()}\n`);
        return 0;
    }

    Logger.setInfoOutputEnabled(args.verbosity >= 1);
    Logger.setDebugOutputEnabled(args.verbosity >= 2);

    const deps: CommandContext = {
        git: new GitClient(runProcess),
        runProcess,
        logger,
        options: args.options,
    };

    let result: CommandResult;
    if (args.mode === 'diff_check') {
        result = await runDiffCheckCommand(deps, await readStdin());
    } else {
        result = await runReformatCommand(deps, args.mode);
    }

    if (!result.ok) {
        process.stderr.write(`${describeError(result.error)}\n`);
        return getExitCode(result.error);
    }
    if (result.output) {
        process.stdout.write(Buffer.from(result.output, CONTENT_ENCODING));
    }
    return result.exitCode;
}

main()
    .then(exitCode => {
        process.exitCode = exitCode;
    })
    .catch(error => {
        logger.error('未处理的错误', error);
        process.exitCode = 1;
    });
