// 配置 schema：profile 与 ranking.json 的结构校验

import { z } from "zod";


export const LaneSchema = z.object({
  displayName: z.string().min(1),
  description: z.string().optional(),
});


/** 默认关注线：顺序即挑选时的关注线顺序 */
export const DEFAULT_LANE_CONFIG: Record<string, z.input<typeof LaneSchema>> = {
  builders: {
    displayName: "Builders",
    description: "Tools, frameworks, agents, shipping, experimenting, what works/breaks in practice",
  },
  security: {
    displayName: "Security",
    description: "Risks, failures, threats, safety, alignment, governance, prompt injection",
  },
  business: {
    displayName: "Business",
    description: "Enterprise deployments, ROI, strategy, use cases, operating models, build vs buy",
  },
};


export const SourceSchema = z.object({
  slug: z.string().min(1),
  name: z.string().min(1),
  enabled: z.boolean().default(false),
  fetchMethod: z.string().default("rss"),
  fetchUrl: z.string().optional(),
  contentType: z.string().optional(),
  trustWeight: z.number().min(0).max(1).default(0.5),
  domains: z.array(z.string()).default([]),
});


export const ProfileSchema = z.object({
  name: z.string().default("Brief"),
  outputPrefix: z.string().default("brief"),
  maxAgeDays: z.number().positive().default(7),
  clusterMinSize: z.number().int().min(1).default(3),
  lanes: z.record(LaneSchema).default(DEFAULT_LANE_CONFIG),
  sources: z.array(SourceSchema).default([]),
});


/** ranking.json：各字段可缺省，由加载器补环境变量与默认值 */
export const RankingFileSchema = z.object({
  weights: z.object({
    recency: z.number().min(0).optional(),
    sourceTrust: z.number().min(0).optional(),
    laneAffinity: z.number().min(0).optional(),
    popularity: z.number().min(0).optional(),
    novelty: z.number().min(0).optional(),
  }).optional(),
  recency: z.object({
    halfLifeHours: z.number().positive().optional(),
  }).optional(),
  selection: z.object({
    targetDigestSize: z.number().int().min(0).optional(),
    maxItemsPerLane: z.number().int().min(0).optional(),
  }).optional(),
});


export type Profile = z.infer<typeof ProfileSchema>;
export type SourceDefinition = z.infer<typeof SourceSchema>;
export type LaneDefinition = z.infer<typeof LaneSchema>;


/** 将 zod 校验错误压成一行 */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}
