import { describe, it, expect } from "vitest";
import { selectForDigest, selectCluster, bestLane } from "../src/ranking/select.js";
import { DEFAULT_LANES } from "../src/types/item.js";


interface TestItem {
  id: string;
  relevanceScore: number;
  clusterId: number;
  clusterTopic: string;
  annotation: { lanes: Record<string, number> };
}


function item(id: string, score: number, clusterId: number, lanes: Record<string, number>): TestItem {
  return { id, relevanceScore: score, clusterId, clusterTopic: `topic-${clusterId}`, annotation: { lanes } };
}


const ids = (items: readonly TestItem[]) => items.map((i) => i.id);


describe("ranking - bestLane", () => {
  it("取最高亲和度，并列取靠前的关注线", () => {
    expect(bestLane(item("a", 0, 0, { builders: 0.1, security: 0.05, business: 0.2 }), DEFAULT_LANES)).toBe("business");
    expect(bestLane(item("b", 0, 0, { builders: 0.2, security: 0.2, business: 0.2 }), DEFAULT_LANES)).toBe("builders");
  });
});


describe("ranking - selectForDigest", () => {
  it("空输入返回空列表", () => {
    expect(selectForDigest([], { targetDigestSize: 10, maxItemsPerLane: 3 })).toEqual([]);
  });

  it("全局预算：5 条合格条目、预算 2 时只选 2 条", () => {
    const items = [
      item("a", 0.9, 0, { builders: 0.8 }),
      item("b", 0.8, 0, { security: 0.8 }),
      item("c", 0.7, 0, { business: 0.8 }),
      item("d", 0.95, 1, { builders: 0.8 }),
      item("e", 0.6, 1, { security: 0.8 }),
    ];
    const result = selectForDigest(items, { targetDigestSize: 2, maxItemsPerLane: 3 });
    expect(result).toHaveLength(1);
    expect(result[0].clusterId).toBe(0);
    expect(ids(result[0].allItems)).toEqual(["a", "b"]);
    expect(result.flatMap((c) => c.allItems)).toHaveLength(2);
  });

  it("每簇每条关注线不超过上限，满员后不再强塞", () => {
    const items = ["a", "b", "c", "d", "e"].map((id, n) => item(id, 0.9 - n * 0.1, 0, { builders: 0.9 }));
    const [cluster] = selectForDigest(items, { targetDigestSize: 10, maxItemsPerLane: 3 });
    expect(ids(cluster.lanes.builders)).toEqual(["a", "b", "c"]);
    expect(cluster.lanes.security).toEqual([]);
    expect(cluster.lanes.business).toEqual([]);
    expect(ids(cluster.allItems)).toEqual(["a", "b", "c"]);
  });

  it("上限按簇计算", () => {
    const items = [
      item("a", 0.9, 0, { builders: 0.9 }),
      item("b", 0.8, 0, { builders: 0.9 }),
      item("c", 0.7, 1, { builders: 0.9 }),
    ];
    const result = selectForDigest(items, { targetDigestSize: 10, maxItemsPerLane: 1 });
    expect(result.map((c) => ids(c.lanes.builders))).toEqual([["a"], ["c"]]);
  });

  it("全部低于阈值时只放入亲和度最高的关注线", () => {
    const items = [item("low", 0.5, 0, { builders: 0.1, security: 0.05, business: 0.2 })];
    const [cluster] = selectForDigest(items, { targetDigestSize: 10, maxItemsPerLane: 3 });
    expect(cluster.lanes).toEqual({ builders: [], security: [], business: [items[0]] });
    expect(ids(cluster.allItems)).toEqual(["low"]);
  });

  it("合格的关注线都已满员时退回到最高关注线，仍满员则跳过", () => {
    const items = [
      item("a", 0.9, 0, { builders: 0.9, business: 0.1 }),
      item("b", 0.8, 0, { builders: 0.8, business: 0.2 }),
    ];
    const [cluster] = selectForDigest(items, { targetDigestSize: 10, maxItemsPerLane: 1 });
    // b 的最高关注线是已满的 builders，business 虽有空位也不放
    expect(ids(cluster.lanes.builders)).toEqual(["a"]);
    expect(cluster.lanes.business).toEqual([]);
    expect(ids(cluster.allItems)).toEqual(["a"]);
  });

  it("进入多条关注线的条目只占一个预算名额", () => {
    const items = [
      item("multi", 0.9, 0, { builders: 0.5, security: 0.4, business: 0.3 }),
      item("next", 0.8, 0, { builders: 0.9 }),
    ];
    const [cluster] = selectForDigest(items, { targetDigestSize: 2, maxItemsPerLane: 3 });
    expect(ids(cluster.lanes.builders)).toEqual(["multi", "next"]);
    expect(ids(cluster.lanes.security)).toEqual(["multi"]);
    expect(ids(cluster.lanes.business)).toEqual(["multi"]);
    expect(ids(cluster.allItems)).toEqual(["multi", "next"]);
  });

  it("簇内按分数降序，同分保持原顺序", () => {
    const items = [
      item("first", 0.5, 0, { builders: 0.9 }),
      item("top", 0.7, 0, { builders: 0.9 }),
      item("second", 0.5, 0, { builders: 0.9 }),
    ];
    const [cluster] = selectForDigest(items, { targetDigestSize: 10, maxItemsPerLane: 3 });
    expect(ids(cluster.allItems)).toEqual(["top", "first", "second"]);
  });

  it("预算按簇 id 升序分配，展示按平均分降序", () => {
    const items = [
      item("big1", 0.4, 0, { builders: 0.9 }),
      item("big2", 0.2, 0, { security: 0.9 }),
      item("small", 0.9, 1, { business: 0.9 }),
      item("late", 0.95, 2, { business: 0.9 }),
    ];
    const result = selectForDigest(items, { targetDigestSize: 3, maxItemsPerLane: 3 });
    // 簇 2 分数最高，但预算在簇 0、1 处用完
    expect(result.map((c) => c.clusterId)).toEqual([1, 0]);
    expect(result.map((c) => c.clusterTopic)).toEqual(["topic-1", "topic-0"]);
  });

  it("没有条目入选的簇被丢弃", () => {
    const items = [item("a", 0.9, 0, { builders: 0.9 })];
    expect(selectForDigest(items, { targetDigestSize: 10, maxItemsPerLane: 0 })).toEqual([]);
  });

  it("按传入的关注线集合建立结果", () => {
    const items = [item("r", 0.5, 0, { research: 0.6 })];
    const [cluster] = selectForDigest(items, { targetDigestSize: 10, maxItemsPerLane: 3 }, ["research", "ops"]);
    expect(Object.keys(cluster.lanes)).toEqual(["research", "ops"]);
    expect(ids(cluster.lanes.research)).toEqual(["r"]);
  });
});


describe("ranking - selectCluster", () => {
  it("累加状态跨簇传递", () => {
    const state = { totalSelected: 0 };
    const config = { targetDigestSize: 3, maxItemsPerLane: 3 };
    const first = selectCluster(0, "x", [item("a", 0.5, 0, { builders: 1 }), item("b", 0.4, 0, { builders: 1 })], config, DEFAULT_LANES, state);
    expect(state.totalSelected).toBe(2);
    const second = selectCluster(1, "y", [item("c", 0.9, 1, { security: 1 }), item("d", 0.8, 1, { security: 1 })], config, DEFAULT_LANES, state);
    expect(state.totalSelected).toBe(3);
    expect(ids(first.allItems)).toEqual(["a", "b"]);
    expect(ids(second.allItems)).toEqual(["c"]);
  });
});
