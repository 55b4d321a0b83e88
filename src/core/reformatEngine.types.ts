/**
 * 格式化引擎依赖类型
 *
 * 引擎只依赖这些窄接口，测试中可以直接传入内存实现，不需要启动进程。
 */

import type { FormatConfig } from '../types/config';
import type { FileKey } from '../types/diff';
import type { FormatRequest } from './formatInvoker';

export interface BeforeContentReader {
    read(key: FileKey): Promise<string>;
}

export interface Formatter {
    format(request: FormatRequest): Promise<string>;
}

/** 按文件绝对路径解析配置 */
export type ConfigResolverFn = (absolutePath: string) => Promise<FormatConfig>;

export interface ReformatEngineDeps {
    topLevel: string;
    contentSource: BeforeContentReader;
    resolveConfig: ConfigResolverFn;
    formatter: Formatter;
}
