import { describe, expect, it } from 'vitest';
import { parseCliArgs } from '../../commands/cliArgs';

describe('parseCliArgs', () => {
    it('无模式参数且 stdin 为管道时进入 diff 检查模式', () => {
        expect(parseCliArgs([], true)).toEqual({
            ok: true,
            args: {
                kind: 'run',
                mode: 'diff_check',
                verbosity: 0,
                options: {
                    stripCount: 1,
                    overrides: { binary: undefined, ignore: undefined },
                    force: false,
                    paths: [],
                },
            },
        });
    });

    it('无模式参数且 stdin 不是管道时报错', () => {
        expect(parseCliArgs([], false)).toEqual({ ok: false, message: '未指定模式，且 stdin 不是管道' });
    });

    it('解析模式、覆盖项与路径', () => {
        const result = parseCliArgs(
            ['--fixup', '-f', '--binary', 'clang-format-17', '--ignore', 'vendor/*,gen/*', '-p', '0', '-vv', '--', 'src', 'include'],
            false
        );

        expect(result).toEqual({
            ok: true,
            args: {
                kind: 'run',
                mode: 'fixup',
                verbosity: 2,
                options: {
                    stripCount: 0,
                    overrides: { binary: 'clang-format-17', ignore: 'vendor/*,gen/*' },
                    force: true,
                    paths: ['src', 'include'],
                },
            },
        });
    });

    it('模式参数互斥', () => {
        expect(parseCliArgs(['--working', '--staged'], false)).toEqual({
            ok: false,
            message: '模式参数互斥: --working, --staged',
        });
    });

    it('diff 检查模式不接受路径参数', () => {
        expect(parseCliArgs(['src'], true)).toEqual({ ok: false, message: 'diff 检查模式不接受路径参数' });
    });

    it('--strip 必须是非负整数', () => {
        expect(parseCliArgs(['--strip', '-1'], true)).toMatchObject({ ok: false });
        expect(parseCliArgs(['--strip=abc'], true)).toEqual({ ok: false, message: '--strip 需要非负整数: abc' });
    });

    it('未知参数报错', () => {
        expect(parseCliArgs(['--bogus'], true)).toMatchObject({ ok: false });
    });

    it('--help 与 --version 优先于其他检查', () => {
        expect(parseCliArgs(['--help', '--working', '--staged'], false)).toEqual({ ok: true, args: { kind: 'help' } });
        expect(parseCliArgs(['--version'], false)).toEqual({ ok: true, args: { kind: 'version' } });
    });

    it('-v 可重复', () => {
        const result = parseCliArgs(['--working', '-v'], false);
        expect(result.ok && result.args.kind === 'run' ? result.args.verbosity : -1).toBe(1);
    });
});
