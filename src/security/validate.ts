// 标注校验：按字段规则表检查并修复模型输出，cleaned 总是完整可落库

import { DEFAULT_LANES } from "../types/item.js";
import type { Annotation, Entity, LaneScores } from "../types/item.js";
import { truncateCodePoints } from "../utils/text.js";


/** 单字段检查结果：ok=false 时 value 为兜底值并附带错误 */
type Coerced<T> = { ok: true; value: T } | { ok: false; value: T; error: string };


/** 字段规则：缺失时取 missing（required 时记错），其余交给 coerce（类型检查 → 截断/夹取/过滤 → 兜底） */
export interface FieldRule<T> {
  key: string;
  missing: T;
  required?: boolean;
  coerce(value: unknown): Coerced<T>;
}


export interface ValidationResult {
  isValid: boolean;
  cleaned: Annotation;
  errors: string[];
}


export const SUMMARY_SHORT_MAX = 500;
export const SUMMARY_LONG_MAX = 2000;


function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}


function textRule(key: string, max: number, required: boolean): FieldRule<string> {
  return {
    key,
    missing: "",
    required,
    coerce(value) {
      if (typeof value !== "string") return { ok: false, value: "", error: `Invalid ${key}: expected string` };
      if (required && value.trim() === "") return { ok: false, value: "", error: `Missing or empty ${key}` };
      return { ok: true, value: truncateCodePoints(value, max) };
    },
  };
}


function stringListRule(key: string): FieldRule<string[]> {
  return {
    key,
    missing: [],
    coerce(value) {
      if (!Array.isArray(value)) return { ok: false, value: [], error: `Invalid ${key}: expected list` };
      return { ok: true, value: value.filter((v): v is string => typeof v === "string") };
    },
  };
}


function entityListRule(key: string): FieldRule<Entity[]> {
  return {
    key,
    missing: [],
    coerce(value) {
      if (!Array.isArray(value)) return { ok: false, value: [], error: `Invalid ${key}: expected list` };
      const entities: Entity[] = [];
      for (const e of value) {
        if (!isRecord(e) || !("name" in e)) continue;
        entities.push({ name: String(e.name), type: "type" in e ? String(e.type) : "unknown" });
      }
      return { ok: true, value: entities };
    },
  };
}


/** 数字、数字字符串、布尔可转为分数；NaN 视为不可转换 */
function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isNaN(value) ? null : value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.trim());
    return Number.isNaN(n) ? null : n;
  }
  return null;
}


function laneRule(lane: string): FieldRule<number> {
  const key = `lane_${lane}`;
  return {
    key,
    missing: 0,
    coerce(value) {
      const n = toNumber(value);
      if (n === null) return { ok: false, value: 0, error: `Invalid ${key} score: got ${typeof value}` };
      return { ok: true, value: Math.max(0, Math.min(1, n)) };
    },
  };
}


export const SUMMARY_SHORT_RULE = textRule("summary_short", SUMMARY_SHORT_MAX, true);
export const SUMMARY_LONG_RULE = textRule("summary_long", SUMMARY_LONG_MAX, false);
export const TOPICS_RULE = stringListRule("topics");
export const ENTITIES_RULE = entityListRule("entities");


/** 校验单个字段，错误追加到 errors */
export function validateField<T>(rule: FieldRule<T>, raw: Record<string, unknown>, errors: string[]): T {
  if (raw[rule.key] === undefined) {
    if (rule.required) errors.push(`Missing or empty ${rule.key}`);
    return rule.missing;
  }
  const result = rule.coerce(raw[rule.key]);
  if (!result.ok) errors.push(result.error);
  return result.value;
}


/** 校验模型返回的原始标注；非对象输入按 {} 处理 */
export function validateAnnotation(raw: unknown, lanes: readonly string[] = DEFAULT_LANES): ValidationResult {
  const record: Record<string, unknown> = isRecord(raw) ? raw : {};
  const errors: string[] = [];

  const summaryShort = validateField(SUMMARY_SHORT_RULE, record, errors);
  const summaryLong = validateField(SUMMARY_LONG_RULE, record, errors);
  const topics = validateField(TOPICS_RULE, record, errors);
  const entities = validateField(ENTITIES_RULE, record, errors);

  const laneScores: LaneScores = {};
  for (const lane of lanes) {
    laneScores[lane] = validateField(laneRule(lane), record, errors);
  }

  return {
    isValid: errors.length === 0,
    cleaned: { summaryShort, summaryLong, topics, entities, lanes: laneScores },
    errors,
  };
}
