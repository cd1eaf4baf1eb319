// 评分配置加载：config/ranking.json → 环境变量 → 默认值

import { RANKING_CONFIG_PATH } from "./paths.js";
import { readJsonFile } from "./json.js";
import { RankingFileSchema, formatIssues } from "./schema.js";
import { ConfigError } from "../errors/index.js";
import type { RankingConfig } from "../ranking/types.js";


export const DEFAULT_RANKING: RankingConfig = {
  weights: { recency: 0.3, sourceTrust: 0.2, laneAffinity: 0.3, popularity: 0.1, novelty: 0.1 },
  recency: { halfLifeHours: 48 },
  selection: { targetDigestSize: 20, maxItemsPerLane: 3 },
};


function envNumber(name: string): number | undefined {
  const v = process.env[name];
  if (v === undefined || v.trim() === "") return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}


export async function loadRankingConfig(path: string = RANKING_CONFIG_PATH): Promise<RankingConfig> {
  const raw = await readJsonFile(path);
  const parsed = RankingFileSchema.safeParse(raw ?? {});
  if (!parsed.success) throw new ConfigError(path, formatIssues(parsed.error));
  const file = parsed.data;
  const d = DEFAULT_RANKING;
  return {
    weights: {
      recency: file.weights?.recency ?? d.weights.recency,
      sourceTrust: file.weights?.sourceTrust ?? d.weights.sourceTrust,
      laneAffinity: file.weights?.laneAffinity ?? d.weights.laneAffinity,
      popularity: file.weights?.popularity ?? d.weights.popularity,
      novelty: file.weights?.novelty ?? d.weights.novelty,
    },
    recency: {
      halfLifeHours: file.recency?.halfLifeHours ?? envNumber("LANEBRIEF_HALF_LIFE_HOURS") ?? d.recency.halfLifeHours,
    },
    selection: {
      targetDigestSize: file.selection?.targetDigestSize ?? envNumber("LANEBRIEF_TARGET_DIGEST_SIZE") ?? d.selection.targetDigestSize,
      maxItemsPerLane: file.selection?.maxItemsPerLane ?? envNumber("LANEBRIEF_MAX_ITEMS_PER_LANE") ?? d.selection.maxItemsPerLane,
    },
  };
}
