// 两轮聚类：先按首个话题标签细分，再把过小的组并入父类；按组大小降序编号

/** 无话题标签的保留组 */
export const UNCATEGORIZED = "uncategorized";

export const DEFAULT_MIN_CLUSTER_SIZE = 3;

const TOPIC_SEPARATOR = " > ";


export interface ClusterableItem {
  annotation?: { topics: readonly string[] };
}


export type Clustered<T> = T & { clusterId: number; clusterTopic: string };


/** "agents > orchestration" → "agents"；无分隔符时返回原标签 */
export function parentTopic(topic: string): string {
  const idx = topic.indexOf(TOPIC_SEPARATOR);
  return idx === -1 ? topic : topic.slice(0, idx);
}


/** 为每个条目分配 clusterId / clusterTopic，返回新对象，顺序与输入一致 */
export function clusterItems<T extends ClusterableItem>(items: readonly T[], minSize: number = DEFAULT_MIN_CLUSTER_SIZE): Clustered<T>[] {
  if (items.length === 0) return [];

  // 第一轮：按首个话题标签分组（Map 保持首次出现顺序）
  const fine = new Map<string, number[]>();
  items.forEach((item, index) => {
    const primary = item.annotation?.topics[0] ?? UNCATEGORIZED;
    const group = fine.get(primary);
    if (group) group.push(index);
    else fine.set(primary, [index]);
  });

  // 第二轮：小于 minSize 的组并入父类
  const merged = new Map<string, number[]>();
  for (const [topic, members] of fine) {
    const key = members.length >= minSize ? topic : parentTopic(topic);
    const group = merged.get(key);
    if (group) group.push(...members);
    else merged.set(key, [...members]);
  }

  // 编号：大小降序，同样大小保持出现顺序（sort 稳定）
  const ordered = [...merged.entries()].sort((a, b) => b[1].length - a[1].length);
  const assignment = new Map<number, { clusterId: number; clusterTopic: string }>();
  ordered.forEach(([topic, members], clusterId) => {
    for (const index of members) assignment.set(index, { clusterId, clusterTopic: topic });
  });

  return items.map((item, index) => {
    const a = assignment.get(index) ?? { clusterId: 0, clusterTopic: UNCATEGORIZED };
    return { ...item, ...a };
  });
}
