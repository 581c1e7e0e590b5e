/**
 * 配置规范化模块
 * 处理和规范化所有配置选项，下游模块只接收规范化后的配置
 */

import path from "path";
import type { PatchOptions } from "../types";

/**
 * 默认值常量 - 集中定义所有默认值
 */
export const CONFIG_DEFAULTS = {
  PROGRAM_NAME: "block-patch",
  MATCH_FILE: "patch_match.txt",
  REPLACE_FILE: "patch_replace.txt",
  PREVIEW_LENGTH: 50,
  ENCODING: "utf8",
} as const;

/**
 * 规范化的选项，所有字段都有确定的值
 */
export interface NormalizedPatchOptions {
  cwd: string;
  // 用户给出的文件名，用于提示信息
  matchFile: string;
  replaceFile: string;
  // 解析后的绝对路径，用于读写
  matchFilePath: string;
  replaceFilePath: string;
  previewLength: number;
  encoding: BufferEncoding;
}

export function normalizeConfig(
  options: PatchOptions = {}
): NormalizedPatchOptions {
  const cwd = path.resolve(options.cwd || process.cwd());
  const matchFile = options.matchFile || CONFIG_DEFAULTS.MATCH_FILE;
  const replaceFile = options.replaceFile || CONFIG_DEFAULTS.REPLACE_FILE;

  const previewLength =
    options.previewLength !== undefined &&
    Number.isInteger(options.previewLength) &&
    options.previewLength >= 0
      ? options.previewLength
      : CONFIG_DEFAULTS.PREVIEW_LENGTH;

  return {
    cwd,
    matchFile,
    replaceFile,
    matchFilePath: path.resolve(cwd, matchFile),
    replaceFilePath: path.resolve(cwd, replaceFile),
    previewLength,
    encoding: CONFIG_DEFAULTS.ENCODING,
  };
}

/**
 * 目标文件路径相对于工作目录解析
 */
export function resolveTargetPath(
  targetPath: string,
  config: NormalizedPatchOptions
): string {
  return path.resolve(config.cwd, targetPath);
}
