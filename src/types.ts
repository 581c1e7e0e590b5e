import type { PatchError } from "./core/error-handler";

/**
 * 输出通道，每次调用写出一行
 */
export type OutputSink = (line: string) => void;

export interface PatchOptions {
  /** 工作目录，伴随文件和相对目标路径都基于它解析，默认 process.cwd() */
  cwd?: string;
  /** 匹配文本所在文件，默认 patch_match.txt */
  matchFile?: string;
  /** 替换文本所在文件，默认 patch_replace.txt */
  replaceFile?: string;
  /** 未找到匹配时回显的匹配文本字符数，默认 50 */
  previewLength?: number;
}

export interface PatchResult {
  success: boolean;
  targetPath: string;
  occurrences: number;
  code?: string;
  error?: PatchError;
}

export interface CompanionTexts {
  matchText: string;
  replaceText: string;
}
