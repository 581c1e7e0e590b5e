/**
 * Text Patcher
 * 以原生字符串切片应用替换计划。
 */
import type { Replacement } from "./replacement-planner";

export function applyReplacements(
  code: string,
  replacements: Replacement[]
): string {
  if (!replacements.length) return code;
  // 从后向前应用，避免位置偏移
  const ordered = [...replacements].sort((a, b) => b.start - a.start);
  let out = code;
  for (const r of ordered) {
    if (r.start < 0 || r.end > code.length || r.start > r.end) {
      throw new Error(
        `Invalid position: start=${r.start}, end=${r.end}, codeLength=${code.length}`
      );
    }
    out = out.slice(0, r.start) + r.newText + out.slice(r.end);
  }
  return out;
}
