/**
 * 日志模块：所有 Logger 实例共享同一输出（单例，默认 stderr），stdout 只留给 diff 报告。
 */

/** 日志输出目标，测试中可替换为内存实现 */
export interface LogSink {
    appendLine(value: string): void;
}

const stderrSink: LogSink = {
    appendLine: (value: string) => {
        process.stderr.write(`${value}\n`);
    },
};

let sharedSink: LogSink = stderrSink;

export class Logger {
    /** 替换共享输出；不传参数时恢复为 stderr */
    static setSharedSink = (sink?: LogSink): void => {
        sharedSink = sink ?? stderrSink;
    };
    private prefix: string;
    private static infoOutputEnabled = false;
    private static debugOutputEnabled = false;

    static setInfoOutputEnabled = (enabled: boolean): void => {
        Logger.infoOutputEnabled = enabled;
    };

    static setDebugOutputEnabled = (enabled: boolean): void => {
        Logger.debugOutputEnabled = enabled;
    };

    constructor(prefix: string = 'hunkfmt') {
        this.prefix = prefix;
    }

    private appendArgs(args: unknown[]): void {
        if (args.length > 0) sharedSink.appendLine(JSON.stringify(args, null, 2));
    }

    info(message: string, ...args: unknown[]): void {
        if (Logger.infoOutputEnabled) {
            sharedSink.appendLine(`[${this.prefix}] [INFO] ${message}`);
            this.appendArgs(args);
        }
    }

    important(message: string, ...args: unknown[]): void {
        sharedSink.appendLine(`[${this.prefix}] [IMPORTANT] ${message}`);
        this.appendArgs(args);
    }

    debug(message: string, ...args: unknown[]): void {
        if (Logger.debugOutputEnabled) {
            sharedSink.appendLine(`[${this.prefix}] [DEBUG] ${message}`);
            this.appendArgs(args);
        }
    }

    error(message: string, error?: unknown): void {
        sharedSink.appendLine(`[${this.prefix}] [ERROR] ${message}`);
        if (error != null) {
            sharedSink.appendLine(
                error instanceof Error ? (error.stack ?? error.message) : String(error)
            );
        }
    }
}
