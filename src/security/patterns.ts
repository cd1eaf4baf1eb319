// 注入规则表：按顺序匹配的（正则, 描述）对，描述进入 flags，原文不进日志


export interface InjectionRule {
  pattern: RegExp;
  description: string;
}


/** 替换命中片段的占位符 */
export const REDACTION_TOKEN = "[REDACTED]";


export const INJECTION_RULES: readonly InjectionRule[] = [
  { pattern: /ignore\s+(?:all\s+)?previous\s+instructions/gi, description: "ignore previous instructions" },
  { pattern: /ignore\s+(?:all\s+)?above\s+instructions/gi, description: "ignore above instructions" },
  { pattern: /disregard\s+(?:all\s+)?previous/gi, description: "disregard previous" },
  { pattern: /forget\s+(?:all\s+)?prior/gi, description: "forget prior" },
  { pattern: /you\s+are\s+now\s+a/gi, description: "role override (you are now a...)" },
  { pattern: /new\s+instructions?:/gi, description: "new instructions marker" },
  { pattern: /system\s*prompt:/gi, description: "system prompt marker" },
  { pattern: /<\s*system\s*>/gi, description: "system tag" },
  { pattern: /<\s*\/?\s*instructions?\s*>/gi, description: "instructions tag" },
  { pattern: /respond\s+with\s+only/gi, description: "output restriction (respond with only)" },
  { pattern: /output\s+only\s+the\s+following/gi, description: "output restriction (output only the following)" },
  { pattern: /do\s+not\s+follow\s+any\s+other/gi, description: "instruction exclusivity (do not follow any other)" },
];
