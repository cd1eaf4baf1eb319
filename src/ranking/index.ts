// 排序步骤：读取当日已标注条目 → 评分 → 聚类 → 回写 → 挑选

import type { ContentItem } from "../types/item.js";
import type { ItemStore } from "../store/types.js";
import type { Profile } from "../config/schema.js";
import { buildTrustLookup, laneIds } from "../config/profile.js";
import { logger } from "../logger/index.js";
import { computeScore } from "./score.js";
import { clusterItems } from "./cluster.js";
import { selectForDigest } from "./select.js";
import type { ClusterSelection, RankingConfig } from "./types.js";


export async function rankAndSelect(
  store: ItemStore,
  profile: Profile,
  ranking: RankingConfig,
  runDate: string,
  now: Date,
): Promise<ClusterSelection<ContentItem>[]> {
  const items = await store.getEnrichedItems(runDate);
  if (items.length === 0) {
    logger.info("rank", "没有待排序的条目", { runDate });
    return [];
  }

  const trustLookup = buildTrustLookup(profile.sources);
  const scored = items.map((item) => ({
    ...item,
    relevanceScore: computeScore(item, ranking.weights, ranking.recency, trustLookup, now),
  }));

  // 所有条目分组完成后才分配簇 id
  const clustered = clusterItems(scored, profile.clusterMinSize);
  const ranked: ContentItem[] = [];
  for (const item of clustered) {
    await store.updateRanking(item.id, {
      relevanceScore: item.relevanceScore,
      clusterId: item.clusterId,
      clusterTopic: item.clusterTopic,
      noveltyFlag: item.noveltyFlag,
    });
    ranked.push({ ...item, status: "ranked" });
  }

  const clusters = selectForDigest(ranked, ranking.selection, laneIds(profile));
  const total = clusters.reduce((n, c) => n + c.allItems.length, 0);
  logger.info("rank", "挑选完成", { scored: items.length, clusters: clusters.length, selected: total });
  return clusters;
}


export { computeScore, scoreComponents, recencyScore, laneAffinity, roundScore, NEUTRAL_SCORE } from "./score.js";
export { clusterItems, parentTopic, UNCATEGORIZED, DEFAULT_MIN_CLUSTER_SIZE } from "./cluster.js";
export { selectForDigest, selectCluster, bestLane, LANE_THRESHOLD } from "./select.js";
export type { ClusterSelection, RankingConfig, RecencyConfig, ScoreComponents, ScoringWeights, SelectionConfig, TrustLookup } from "./types.js";
