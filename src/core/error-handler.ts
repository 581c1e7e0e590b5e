/**
 * 错误处理模块
 * 提供统一的错误处理机制，包括错误类型、错误生成和格式化方法
 */

import { CONFIG_DEFAULTS } from "./config-normalizer";
import type { OutputSink } from "../types";

// 错误类别枚举
export enum ErrorCategory {
  USAGE = "USAGE", // 命令行参数错误
  CONFIG = "CONFIG", // 伴随文件配置错误
  CONTAINMENT = "CONTAINMENT", // 目标文件中找不到匹配文本
  FILE_OPERATION = "FILE_OPERATION", // 文件读写错误
  UNKNOWN = "UNKNOWN", // 未知错误
}

// 统一错误接口
export interface PatchError {
  code: string; // 错误代码，例如 CONFIG001
  category: ErrorCategory;
  message: string;
  details?: string;
  filePath?: string;
  preview?: string; // 匹配文本预览，仅 MATCH001 使用
  suggestion?: string;
  exitCode: number;
  originalError?: Error;
}

interface ErrorDefinition {
  code: string;
  category: ErrorCategory;
  messageTemplate: string;
  suggestionTemplate?: string;
}

// 所有失败共用同一个退出码
export const FAILURE_EXIT_CODE = 1;

const errorDefinitions: Record<string, ErrorDefinition> = {
  USAGE001: {
    code: "USAGE001",
    category: ErrorCategory.USAGE,
    messageTemplate: "Usage: {0} <target_file>",
    suggestionTemplate: "Pass exactly one target file path",
  },

  CONFIG001: {
    code: "CONFIG001",
    category: ErrorCategory.CONFIG,
    messageTemplate: "{0} and {1} must exist.",
    suggestionTemplate:
      "Create {0} with the text to find and {1} with the text to put in its place",
  },
  CONFIG002: {
    code: "CONFIG002",
    category: ErrorCategory.CONFIG,
    messageTemplate: "Match text in {0} is empty.",
    suggestionTemplate:
      "Put the exact block to search for in {0}; an empty match is rejected instead of inserting the replacement between every character",
  },

  MATCH001: {
    code: "MATCH001",
    category: ErrorCategory.CONTAINMENT,
    messageTemplate: "Match text not found in {0}",
    suggestionTemplate:
      "The match text must appear verbatim in {0}, including indentation and line endings; it may already have been patched",
  },

  FILE001: {
    code: "FILE001",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "Failed to read file: {0}",
    suggestionTemplate: "Check that the file exists and is readable",
  },
  FILE002: {
    code: "FILE002",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "Failed to write file: {0}",
    suggestionTemplate:
      "Check write permission on the file and free space on the disk",
  },

  GENERAL001: {
    code: "GENERAL001",
    category: ErrorCategory.UNKNOWN,
    messageTemplate: "Unexpected error: {0}",
  },
};

/**
 * 创建格式化的错误对象
 */
export function createPatchError(
  errorCode: string,
  params: string[] = [],
  options: {
    filePath?: string;
    preview?: string;
    suggestion?: string;
    originalError?: Error;
  } = {}
): PatchError {
  const definition = errorDefinitions[errorCode] || errorDefinitions.GENERAL001;

  let message = definition.messageTemplate;
  let suggestion = options.suggestion ?? definition.suggestionTemplate ?? "";

  params.forEach((param, index) => {
    message = message.replace(`{${index}}`, param);
    suggestion = suggestion.replace(`{${index}}`, param);
  });

  return {
    code: definition.code,
    category: definition.category,
    message,
    details: options.originalError?.message,
    filePath: options.filePath,
    preview: options.preview,
    suggestion: suggestion || undefined,
    exitCode: FAILURE_EXIT_CODE,
    originalError: options.originalError,
  };
}

const errnoSuggestions: Record<string, string> = {
  ENOENT: "The file does not exist, check the path",
  EACCES: "Permission denied, check the file permissions",
  EPERM: "Operation not permitted, check the file permissions",
  EISDIR: "The path points to a directory, not a file",
  ENOSPC: "No space left on the device",
  EROFS: "The file system is read-only",
  ERR_ENCODING_INVALID_ENCODED_DATA:
    "The file is not valid UTF-8 text; convert it to UTF-8 first",
};

function getErrnoCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * 把文件系统抛出的异常转换为 FILE001 / FILE002
 */
export function enhanceError(
  error: unknown,
  filePath: string,
  operation: "read" | "write"
): PatchError {
  const originalError =
    error instanceof Error ? error : new Error(String(error));
  const errno = getErrnoCode(originalError);

  return createPatchError(
    operation === "read" ? "FILE001" : "FILE002",
    [filePath],
    {
      filePath,
      originalError,
      suggestion: errno ? errnoSuggestions[errno] : undefined,
    }
  );
}

/**
 * 格式化为包含代码、详情和建议的完整信息
 */
export function formatError(error: PatchError): string {
  let formattedMessage = `[${error.code}] ${error.message}`;

  if (error.filePath) {
    formattedMessage += `\nFile: ${error.filePath}`;
  }

  if (error.preview !== undefined) {
    formattedMessage += `\nSearching for: ${error.preview}...`;
  }

  if (error.details && error.details !== error.message) {
    formattedMessage += `\nDetails: ${error.details}`;
  }

  if (error.suggestion) {
    formattedMessage += `\nSuggestion: ${error.suggestion}`;
  }

  return formattedMessage;
}

/**
 * 面向终端用户的简短输出，每个元素一行
 */
export function formatErrorLines(error: PatchError): string[] {
  if (error.category === ErrorCategory.USAGE) {
    return [error.message];
  }

  const lines = [`Error: ${error.message}`];
  if (error.preview !== undefined) {
    lines.push(`Searching for: ${error.preview}...`);
  }
  return lines;
}

export function reportError(
  error: PatchError,
  output: OutputSink = console.log,
  verbose = false
): void {
  if (verbose) {
    output(formatError(error));
    return;
  }
  formatErrorLines(error).forEach((line) => output(line));
}

export function createUsageError(
  programName: string = CONFIG_DEFAULTS.PROGRAM_NAME
): PatchError {
  return createPatchError("USAGE001", [programName]);
}
