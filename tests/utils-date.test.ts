import { describe, it, expect } from "vitest";
import { parsePublishedAt, toLocalDateString } from "../src/utils/date.js";


describe("utils - parsePublishedAt", () => {
  it("解析带时区与无时区的 ISO 时间", () => {
    expect(parsePublishedAt("2026-10-16T12:00:00Z")?.toISOString()).toBe("2026-10-16T12:00:00.000Z");
    expect(parsePublishedAt("2026-10-16T12:00:00")?.toISOString()).toBe("2026-10-16T12:00:00.000Z");
    expect(parsePublishedAt("2026-10-16 12:00")?.toISOString()).toBe("2026-10-16T12:00:00.000Z");
    expect(parsePublishedAt("2026-10-16T12:00:00.250+05")?.toISOString()).toBe("2026-10-16T07:00:00.250Z");
    expect(parsePublishedAt("2026-10-16T12:00:00-0130")?.toISOString()).toBe("2026-10-16T13:30:00.000Z");
  });

  it("纯日期按 UTC 零点", () => {
    expect(parsePublishedAt("2026-10-16")?.toISOString()).toBe("2026-10-16T00:00:00.000Z");
  });

  it("无法解析返回 null", () => {
    expect(parsePublishedAt("Fri, 16 Oct 2026 12:00:00 GMT")).toBeNull();
    expect(parsePublishedAt("2026-13-40T00:00:00Z")).toBeNull();
    expect(parsePublishedAt("")).toBeNull();
    expect(parsePublishedAt(null)).toBeNull();
  });

  it("不存在的日期与时刻不顺延，返回 null", () => {
    expect(parsePublishedAt("2026-02-30T00:00:00Z")).toBeNull();
    expect(parsePublishedAt("2026-02-29")).toBeNull();
    expect(parsePublishedAt("2026-04-31T08:00:00")).toBeNull();
    expect(parsePublishedAt("2026-03-01T24:00:00Z")).toBeNull();
    expect(parsePublishedAt("2026-03-01T12:60:00Z")).toBeNull();
    expect(parsePublishedAt("2026-03-01T12:00:60Z")).toBeNull();
  });

  it("闰日与边界时刻正常解析", () => {
    expect(parsePublishedAt("2028-02-29")?.toISOString()).toBe("2028-02-29T00:00:00.000Z");
    expect(parsePublishedAt("2026-12-31T23:59:59Z")?.toISOString()).toBe("2026-12-31T23:59:59.000Z");
  });
});


describe("utils - toLocalDateString", () => {
  it("按本地日期补零", () => {
    expect(toLocalDateString(new Date(2026, 0, 5, 23, 59))).toBe("2026-01-05");
  });
});
