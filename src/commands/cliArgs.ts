/**
 * 命令行参数解析
 *
 * 模式互斥：--working / --staged / --amend / --fixup；都未指定且 stdin 为管道时进入 diff 检查模式。
 */

import { parseArgs } from 'util';
import type { ReformatMode } from './reformatCommand';
import type { CommandOptions } from './commandContext';

export type CliMode = ReformatMode | 'diff_check';

export type CliArgs =
    | { kind: 'help' }
    | { kind: 'version' }
    | { kind: 'run'; mode: CliMode; verbosity: number; options: CommandOptions };

export type CliArgsResult = { ok: true; args: CliArgs } | { ok: false; message: string };

const MODE_FLAGS: readonly ReformatMode[] = ['working', 'staged', 'amend', 'fixup'];

export const USAGE = `用法: git diff -U0 --no-color | hunkfmt [选项]
      hunkfmt (--working | --staged | --amend | --fixup) [选项] [-- <路径>...]

模式（互斥）:
  （无）           从 stdin 读取 diff，输出格式化 diff；有差异时退出码为 1
  --working        格式化工作区中未暂存的变更行
  --staged         格式化暂存区中的变更行，结果写回工作区
  --amend          格式化上一提交以来的变更并 amend 当前提交
  --fixup          格式化上一提交以来的变更并创建 fixup 提交

选项:
  --binary <路径>   格式化工具可执行文件（默认 clang-format）
  --ignore <模式>   逗号分隔的 glob 忽略模式，覆盖配置文件
  -f, --force       amend/fixup 时忽略未暂存修改检查
  -p, --strip <n>   diff 文件头去掉的路径段数（默认 1）
  -v, --verbose     输出日志，重复两次输出调试日志
  -h, --help        显示帮助
  --version         显示版本`;

const parseRawArgs = (argv: readonly string[]) =>
    parseArgs({
        args: [...argv],
        allowPositionals: true,
        strict: true,
        options: {
            working: { type: 'boolean' },
            staged: { type: 'boolean' },
            amend: { type: 'boolean' },
            fixup: { type: 'boolean' },
            binary: { type: 'string' },
            ignore: { type: 'string' },
            force: { type: 'boolean', short: 'f' },
            strip: { type: 'string', short: 'p' },
            verbose: { type: 'boolean', short: 'v', multiple: true },
            help: { type: 'boolean', short: 'h' },
            version: { type: 'boolean' },
        },
    });

/**
 * @param argv - 不含 node 与脚本路径的参数
 * @param stdinIsPiped - stdin 是否为管道（非 TTY）
 */
export const parseCliArgs = (argv: readonly string[], stdinIsPiped: boolean): CliArgsResult => {
    let parsed: ReturnType<typeof parseRawArgs>;
    try {
        parsed = parseRawArgs(argv);
    } catch (error) {
        return { ok: false, message: error instanceof Error ? error.message : String(error) };
    }
    const { values, positionals } = parsed;

    if (values.help) {
        return { ok: true, args: { kind: 'help' } };
    }
    if (values.version) {
        return { ok: true, args: { kind: 'version' } };
    }

    const selected: readonly (ReformatMode | undefined)[] = MODE_FLAGS.filter(mode => values[mode] === true);
    if (selected.length > 1) {
        return { ok: false, message: `模式参数互斥: ${selected.map(mode => `--${mode}`).join(', ')}` };
    }
    const mode: CliMode | undefined = selected[0] ?? (stdinIsPiped ? 'diff_check' : undefined);
    if (mode === undefined) {
        return { ok: false, message: '未指定模式，且 stdin 不是管道' };
    }
    if (mode === 'diff_check' && positionals.length > 0) {
        return { ok: false, message: 'diff 检查模式不接受路径参数' };
    }

    const stripText = values.strip ?? '1';
    if (!/^\d+$/.test(stripText)) {
        return { ok: false, message: `--strip 需要非负整数: ${stripText}` };
    }

    return {
        ok: true,
        args: {
            kind: 'run',
            mode,
            verbosity: values.verbose?.length ?? 0,
            options: {
                stripCount: parseInt(stripText, 10),
                overrides: { binary: values.binary, ignore: values.ignore },
                force: values.force === true,
                paths: positionals,
            },
        },
    };
};
