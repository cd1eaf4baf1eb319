// 评分：新鲜度、信源信任、关注线亲和度、热度、新颖度五项加权，纯函数

import type { LaneScores } from "../types/item.js";
import { parsePublishedAt } from "../utils/date.js";
import type { RecencyConfig, ScoreComponents, ScoringWeights, TrustLookup } from "./types.js";


/** 无外部信号时的中性分 */
export const NEUTRAL_SCORE = 0.5;


/** 评分所需的最小条目结构 */
export interface ScorableItem {
  sourceId: string;
  publishedAt?: string | null;
  annotation?: { lanes: LaneScores };
}


/** 指数衰减：exp(-ln2 · 小时数 / 半衰期)；无日期取中性分 */
export function recencyScore(publishedAt: string | null | undefined, recency: RecencyConfig, now: Date): number {
  const published = parsePublishedAt(publishedAt);
  if (!published) return NEUTRAL_SCORE;
  const hoursAgo = (now.getTime() - published.getTime()) / 3_600_000;
  return Math.exp(-Math.LN2 * hoursAgo / recency.halfLifeHours);
}


/** 取最强关注线，而非平均 */
export function laneAffinity(lanes: LaneScores | undefined): number {
  const values = lanes ? Object.values(lanes) : [];
  return values.length > 0 ? Math.max(...values) : 0;
}


export function scoreComponents(item: ScorableItem, recency: RecencyConfig, trustLookup: TrustLookup, now: Date): ScoreComponents {
  return {
    recency: recencyScore(item.publishedAt, recency, now),
    sourceTrust: trustLookup.get(item.sourceId) ?? NEUTRAL_SCORE,
    laneAffinity: laneAffinity(item.annotation?.lanes),
    // 热度与新颖度暂无外部信号，保留为扩展点
    popularity: NEUTRAL_SCORE,
    novelty: NEUTRAL_SCORE,
  };
}


export function roundScore(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}


/** 综合相关度，保留 4 位小数 */
export function computeScore(
  item: ScorableItem,
  weights: ScoringWeights,
  recency: RecencyConfig,
  trustLookup: TrustLookup,
  now: Date,
): number {
  const c = scoreComponents(item, recency, trustLookup, now);
  const score =
    weights.recency * c.recency +
    weights.sourceTrust * c.sourceTrust +
    weights.laneAffinity * c.laneAffinity +
    weights.popularity * c.popularity +
    weights.novelty * c.novelty;
  return roundScore(score);
}
