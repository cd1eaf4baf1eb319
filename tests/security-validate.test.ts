import { describe, it, expect } from "vitest";
import { validateAnnotation, SUMMARY_SHORT_MAX, SUMMARY_LONG_MAX } from "../src/security/validate.js";


const valid = {
  summary_short: "Agents ship faster with typed tools.",
  summary_long: "A longer paragraph.",
  topics: ["agents > orchestration", "tooling"],
  entities: [{ name: "Acme", type: "company" }],
  lane_builders: 0.8,
  lane_security: 0.1,
  lane_business: 0.4,
};


describe("security - validateAnnotation", () => {
  it("合法输入原样通过", () => {
    const result = validateAnnotation(valid);
    expect(result.isValid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.cleaned).toEqual({
      summaryShort: "Agents ship faster with typed tools.",
      summaryLong: "A longer paragraph.",
      topics: ["agents > orchestration", "tooling"],
      entities: [{ name: "Acme", type: "company" }],
      lanes: { builders: 0.8, security: 0.1, business: 0.4 },
    });
  });

  it("空对象：返回完整的兜底结构，只报缺少 summary_short", () => {
    const result = validateAnnotation({});
    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual(["Missing or empty summary_short"]);
    expect(result.cleaned).toEqual({
      summaryShort: "",
      summaryLong: "",
      topics: [],
      entities: [],
      lanes: { builders: 0, security: 0, business: 0 },
    });
  });

  it("非对象输入按空对象处理", () => {
    for (const raw of [null, undefined, "text", 42, ["a"]]) {
      const result = validateAnnotation(raw);
      expect(result.errors).toEqual(["Missing or empty summary_short"]);
      expect(result.cleaned.lanes).toEqual({ builders: 0, security: 0, business: 0 });
    }
  });

  it("空白 summary_short 视为缺失", () => {
    const result = validateAnnotation({ ...valid, summary_short: "   " });
    expect(result.errors).toEqual(["Missing or empty summary_short"]);
    expect(result.cleaned.summaryShort).toBe("");
  });

  it("超长摘要按字符截断，不算错误", () => {
    const result = validateAnnotation({
      ...valid,
      summary_short: "a".repeat(SUMMARY_SHORT_MAX + 20),
      summary_long: "b".repeat(SUMMARY_LONG_MAX + 1),
    });
    expect(result.isValid).toBe(true);
    expect(result.cleaned.summaryShort).toHaveLength(SUMMARY_SHORT_MAX);
    expect(result.cleaned.summaryLong).toHaveLength(SUMMARY_LONG_MAX);
  });

  it("截断不切断代理对", () => {
    const result = validateAnnotation({ ...valid, summary_short: "😀".repeat(SUMMARY_SHORT_MAX + 1) });
    expect(Array.from(result.cleaned.summaryShort)).toHaveLength(SUMMARY_SHORT_MAX);
    expect(result.cleaned.summaryShort).toBe("😀".repeat(SUMMARY_SHORT_MAX));
  });

  it("关注线分数夹到 [0, 1]", () => {
    const result = validateAnnotation({ ...valid, lane_builders: 1.7, lane_security: -0.2 });
    expect(result.isValid).toBe(true);
    expect(result.cleaned.lanes).toEqual({ builders: 1, security: 0, business: 0.4 });
  });

  it("数字字符串与布尔可转换", () => {
    const result = validateAnnotation({ ...valid, lane_builders: "0.65", lane_security: true, lane_business: false });
    expect(result.isValid).toBe(true);
    expect(result.cleaned.lanes).toEqual({ builders: 0.65, security: 1, business: 0 });
  });

  it("无法转换的分数置 0 并报一条错误", () => {
    const result = validateAnnotation({ ...valid, lane_security: "not a number" });
    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual(["Invalid lane_security score: got string"]);
    expect(result.cleaned.lanes.security).toBe(0);
  });

  it("topics / entities 类型错误时置空并报错", () => {
    const result = validateAnnotation({ ...valid, topics: "agents", entities: { name: "x" } });
    expect(result.errors).toEqual(["Invalid topics: expected list", "Invalid entities: expected list"]);
    expect(result.cleaned.topics).toEqual([]);
    expect(result.cleaned.entities).toEqual([]);
  });

  it("过滤非字符串话题与缺少 name 的实体，缺 type 记为 unknown", () => {
    const result = validateAnnotation({
      ...valid,
      topics: ["security", 3, null, "evals"],
      entities: [{ name: "Beta" }, { type: "person" }, "Gamma", { name: 7, type: "org" }],
    });
    expect(result.isValid).toBe(true);
    expect(result.cleaned.topics).toEqual(["security", "evals"]);
    expect(result.cleaned.entities).toEqual([
      { name: "Beta", type: "unknown" },
      { name: "7", type: "org" },
    ]);
  });

  it("summary_short 非字符串时报类型错误", () => {
    const result = validateAnnotation({ ...valid, summary_short: 12 });
    expect(result.errors).toEqual(["Invalid summary_short: expected string"]);
    expect(result.cleaned.summaryShort).toBe("");
  });

  it("按传入的关注线集合校验", () => {
    const result = validateAnnotation({ summary_short: "x", lane_research: 0.5 }, ["research"]);
    expect(result.isValid).toBe(true);
    expect(result.cleaned.lanes).toEqual({ research: 0.5 });
  });
});
