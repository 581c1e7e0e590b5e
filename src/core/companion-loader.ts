/**
 * 伴随文件加载
 * 检查 patch_match.txt / patch_replace.txt 是否存在并读取其中的文本
 */

import fs from "fs";
import type { CompanionTexts } from "../types";
import type { NormalizedPatchOptions } from "./config-normalizer";
import { readUtf8File } from "./utils";
import { createPatchError, enhanceError, type PatchError } from "./error-handler";

export type CompanionLoadResult =
  | { ok: true; texts: CompanionTexts }
  | { ok: false; error: PatchError };

/**
 * 两个伴随文件都存在时返回 null，否则返回 CONFIG001
 */
export function checkCompanionFiles(
  config: NormalizedPatchOptions
): PatchError | null {
  if (
    !fs.existsSync(config.matchFilePath) ||
    !fs.existsSync(config.replaceFilePath)
  ) {
    return createPatchError("CONFIG001", [config.matchFile, config.replaceFile]);
  }
  return null;
}

export function loadCompanionTexts(
  config: NormalizedPatchOptions
): CompanionLoadResult {
  const missing = checkCompanionFiles(config);
  if (missing) {
    return { ok: false, error: missing };
  }

  const texts: CompanionTexts = { matchText: "", replaceText: "" };
  const sources = [
    { key: "matchText", path: config.matchFilePath, name: config.matchFile },
    { key: "replaceText", path: config.replaceFilePath, name: config.replaceFile },
  ] as const;

  for (const source of sources) {
    try {
      // 首尾空白不参与匹配，中间的空白原样保留
      texts[source.key] = readUtf8File(source.path).trim();
    } catch (error) {
      return { ok: false, error: enhanceError(error, source.name, "read") };
    }
  }

  if (!texts.matchText) {
    return {
      ok: false,
      error: createPatchError("CONFIG002", [config.matchFile], {
        filePath: config.matchFile,
      }),
    };
  }

  return { ok: true, texts };
}
