/**
 * 配置相关类型定义
 *
 * 集中维护 FormatConfig 与各层配置的结构，供 config、core、commands 模块引用。
 */

/**
 * 配置文件（.hunkfmt.yaml）的数据结构
 * ignore 既可以是逗号分隔的字符串，也可以是 YAML 列表
 */
export interface HunkfmtFileConfig {
    binary?: string;
    ignore?: string | string[];
}

/** 命令行覆盖项：优先级最高，最后应用 */
export interface FormatConfigOverrides {
    binary?: string;
    ignore?: string;
}

/** 单个文件最终生效的格式化配置（不可变） */
export interface FormatConfig {
    readonly binary: string;                    // 格式化工具可执行文件（名称或路径）
    readonly ignorePatterns: readonly string[]; // glob 忽略模式，按配置顺序
    readonly sourcePath: string | null;         // 配置来源文件，未找到时为 null
}
