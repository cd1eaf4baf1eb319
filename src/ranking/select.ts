// 预算挑选：按簇 id 升序贪心填充全局预算，同时遵守每簇每条关注线上限

import { DEFAULT_LANES } from "../types/item.js";
import type { LaneScores } from "../types/item.js";
import { UNCATEGORIZED } from "./cluster.js";
import type { ClusterSelection, SelectionConfig } from "./types.js";


/** 自然进入某条关注线的最低亲和度 */
export const LANE_THRESHOLD = 0.3;


export interface SelectableItem {
  relevanceScore?: number;
  clusterId?: number;
  clusterTopic?: string;
  annotation?: { lanes: LaneScores };
}


/** 跨簇传递的累加状态 */
export interface SelectionState {
  totalSelected: number;
}


function laneScore(item: SelectableItem, lane: string): number {
  return item.annotation?.lanes[lane] ?? 0;
}


/** 亲和度最高的关注线，并列取靠前者 */
export function bestLane(item: SelectableItem, lanes: readonly string[]): string | undefined {
  let best: string | undefined;
  let bestScore = -Infinity;
  for (const lane of lanes) {
    const s = laneScore(item, lane);
    if (s > bestScore) {
      best = lane;
      bestScore = s;
    }
  }
  return best;
}


/** 单簇挑选：返回本簇结果，state.totalSelected 随之推进 */
export function selectCluster<T extends SelectableItem>(
  clusterId: number,
  clusterTopic: string,
  members: readonly T[],
  config: SelectionConfig,
  lanes: readonly string[],
  state: SelectionState,
): ClusterSelection<T> {
  const selected: ClusterSelection<T> = {
    clusterId,
    clusterTopic,
    lanes: Object.fromEntries(lanes.map((lane): [string, T[]] => [lane, []])),
    allItems: [],
  };
  const hasRoom = (lane: string) => selected.lanes[lane].length < config.maxItemsPerLane;

  const ranked = [...members].sort((a, b) => (b.relevanceScore ?? 0) - (a.relevanceScore ?? 0));
  for (const item of ranked) {
    if (state.totalSelected >= config.targetDigestSize) break;

    let added = false;
    for (const lane of lanes) {
      if (laneScore(item, lane) >= LANE_THRESHOLD && hasRoom(lane)) {
        selected.lanes[lane].push(item);
        added = true;
      }
    }

    // 没有自然入选任何关注线：退回到亲和度最高的一条
    if (!added) {
      const lane = bestLane(item, lanes);
      if (lane !== undefined && hasRoom(lane)) {
        selected.lanes[lane].push(item);
        added = true;
      }
    }

    if (added) {
      selected.allItems.push(item);
      state.totalSelected++;
    }
  }
  return selected;
}


function meanScore<T extends SelectableItem>(cluster: ClusterSelection<T>): number {
  const sum = cluster.allItems.reduce((acc, item) => acc + (item.relevanceScore ?? 0), 0);
  return sum / Math.max(cluster.allItems.length, 1);
}


/** 挑选入选条目，结果按簇平均分降序 */
export function selectForDigest<T extends SelectableItem>(
  items: readonly T[],
  config: SelectionConfig,
  lanes: readonly string[] = DEFAULT_LANES,
): ClusterSelection<T>[] {
  const clusters = new Map<number, { topic: string; members: T[] }>();
  for (const item of items) {
    const cid = item.clusterId ?? 0;
    const entry = clusters.get(cid);
    if (entry) entry.members.push(item);
    else clusters.set(cid, { topic: item.clusterTopic ?? UNCATEGORIZED, members: [item] });
  }

  const state: SelectionState = { totalSelected: 0 };
  const result: ClusterSelection<T>[] = [];
  for (const cid of [...clusters.keys()].sort((a, b) => a - b)) {
    if (state.totalSelected >= config.targetDigestSize) break;
    const { topic, members } = clusters.get(cid) ?? { topic: UNCATEGORIZED, members: [] };
    const selected = selectCluster(cid, topic, members, config, lanes, state);
    if (selected.allItems.length > 0) result.push(selected);
  }

  return result
    .map((cluster) => ({ cluster, mean: meanScore(cluster) }))
    .sort((a, b) => b.mean - a.mean)
    .map(({ cluster }) => cluster);
}
