/**
 * Replacement Planner
 * 在原始文本上从左到右收集匹配文本的所有不重叠出现位置。
 * 所有位置都相对于原始文本，替换后的内容不会被再次扫描。
 */
export type Replacement = { start: number; end: number; newText: string };
export interface ReplacementPlan {
  replacements: Replacement[];
}
export function createEmptyPlan(): ReplacementPlan {
  return { replacements: [] };
}

export function planReplacements(
  content: string,
  matchText: string,
  replaceText: string
): ReplacementPlan {
  const plan = createEmptyPlan();
  // 空字符串会在每个位置都匹配
  if (!matchText) return plan;

  let index = content.indexOf(matchText);
  while (index !== -1) {
    const end = index + matchText.length;
    plan.replacements.push({ start: index, end, newText: replaceText });
    index = content.indexOf(matchText, end);
  }
  return plan;
}
