// 内容清洗：送入模型前剔除已知的指令覆盖话术

import { logger } from "../logger/index.js";
import { INJECTION_RULES, REDACTION_TOKEN } from "./patterns.js";


export interface SanitizeResult<T = string> {
  text: T;
  /** 命中规则的描述，每条规则最多一次 */
  flags: string[];
}


/** 按规则表依次替换命中片段；空文本原样返回 */
export function sanitizeContent(text: string, sourceId?: string): SanitizeResult;
export function sanitizeContent(text: string | null | undefined, sourceId?: string): SanitizeResult<string | null | undefined>;
export function sanitizeContent(text: string | null | undefined, sourceId?: string): SanitizeResult<string | null | undefined> {
  if (!text) return { text, flags: [] };

  const flags: string[] = [];
  let sanitized = text;
  for (const rule of INJECTION_RULES) {
    let hit = false;
    sanitized = sanitized.replace(rule.pattern, () => {
      hit = true;
      return REDACTION_TOKEN;
    });
    if (hit) flags.push(rule.description);
  }

  if (flags.length > 0) {
    logger.warn("security", "已剔除疑似注入指令", { source_id: sourceId ?? "unknown", flagCount: flags.length });
  }
  return { text: sanitized, flags };
}
