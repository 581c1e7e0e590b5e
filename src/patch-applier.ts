/**
 * 补丁应用器
 * 读取匹配文本和替换文本，检查目标文件中是否包含匹配文本，替换所有出现位置后写回原文件
 */

import fs from "fs";
import type { PatchOptions, PatchResult } from "./types";
import {
  normalizeConfig,
  resolveTargetPath,
} from "./core/config-normalizer";
import { loadCompanionTexts } from "./core/companion-loader";
import { createPatchError, enhanceError, type PatchError } from "./core/error-handler";
import { readUtf8File } from "./core/utils";
import { planReplacements } from "./core/replacement-planner";
import { applyReplacements } from "./core/text-patcher";

function failure(targetPath: string, error: PatchError): PatchResult {
  return { success: false, targetPath, occurrences: 0, error };
}

/**
 * 在目标文件中把匹配文本的每一处出现替换为替换文本
 * 任何一步失败都不会写入目标文件
 */
export function applyPatch(
  targetPath: string,
  options: PatchOptions = {}
): PatchResult {
  const config = normalizeConfig(options);

  const loaded = loadCompanionTexts(config);
  if (!loaded.ok) {
    return failure(targetPath, loaded.error);
  }
  const { matchText, replaceText } = loaded.texts;

  const absoluteTarget = resolveTargetPath(targetPath, config);
  let content: string;
  try {
    content = readUtf8File(absoluteTarget);
  } catch (error) {
    return failure(targetPath, enhanceError(error, targetPath, "read"));
  }

  const plan = planReplacements(content, matchText, replaceText);
  if (plan.replacements.length === 0) {
    return failure(
      targetPath,
      createPatchError("MATCH001", [targetPath], {
        filePath: targetPath,
        // 按字符截取，避免切断代理对
        preview: Array.from(matchText)
          .slice(0, config.previewLength)
          .join(""),
      })
    );
  }

  const newContent = applyReplacements(content, plan.replacements);

  try {
    fs.writeFileSync(absoluteTarget, newContent, config.encoding);
  } catch (error) {
    return failure(targetPath, enhanceError(error, targetPath, "write"));
  }

  return {
    success: true,
    targetPath,
    occurrences: plan.replacements.length,
    code: newContent,
  };
}
