import { describe, it, expect } from "vitest";
import { addDays, parseDateTime, shiftDays, toDateOnly, toUtcIso } from "../utils/time";

describe("time - toUtcIso", () => {
  it("无时区的字符串按 UTC 处理", () => {
    expect(toUtcIso("2025-03-01 09:30:00")).toBe("2025-03-01T09:30:00.000Z");
  });

  it("保留已有偏移", () => {
    expect(toUtcIso("2025-03-01T09:30:00+02:00")).toBe("2025-03-01T07:30:00.000Z");
  });

  it("空值返回 null", () => {
    expect(toUtcIso(null)).toBeNull();
    expect(toUtcIso("   ")).toBeNull();
  });
});

describe("time - parseDateTime", () => {
  it("解析带 Z 的日期时间", () => {
    expect(parseDateTime("2025-03-01T09:30:00Z")?.toISOString()).toBe("2025-03-01T09:30:00.000Z");
  });

  it("不带秒也可以", () => {
    expect(parseDateTime("2025-03-01T09:30")?.toISOString()).toBe("2025-03-01T09:30:00.000Z");
  });

  it("拒绝纯日期、非法日期和任意文本", () => {
    expect(parseDateTime("2025-03-01")).toBeNull();
    expect(parseDateTime("2025-02-30T10:00:00Z")).toBeNull();
    expect(parseDateTime("tomorrow")).toBeNull();
  });

  it("时、分、秒或偏移超出范围时返回 null", () => {
    expect(parseDateTime("2025-01-01T25:00:00Z")).toBeNull();
    expect(parseDateTime("2025-01-01T10:61:00Z")).toBeNull();
    expect(parseDateTime("2025-01-01T10:00:60Z")).toBeNull();
    expect(parseDateTime("2025-01-01T10:00:00+99:00")).toBeNull();
  });

  it("空格分隔并带偏移", () => {
    expect(parseDateTime("2025-03-01 09:30:00+02:00")?.toISOString()).toBe(
      "2025-03-01T07:30:00.000Z",
    );
  });
});

describe("time - toDateOnly", () => {
  it("YYYY-MM-DD 原样返回", () => {
    expect(toDateOnly("2024-02-29")).toBe("2024-02-29");
  });

  it("日期时间取书写的日期部分", () => {
    expect(toDateOnly("2025-03-01T23:30:00-05:00")).toBe("2025-03-01");
  });

  it("非法日期返回 null", () => {
    expect(toDateOnly("2025-02-29")).toBeNull();
    expect(toDateOnly("03/01/2025")).toBeNull();
    expect(toDateOnly("2025-01-01T10:61:00Z")).toBeNull();
  });
});

describe("time - addDays / shiftDays", () => {
  it("跨月、跨年", () => {
    expect(addDays("2025-12-31", 1)).toBe("2026-01-01");
    expect(addDays("2025-03-01", -1)).toBe("2025-02-28");
  });

  it("Date 平移整数天", () => {
    const shifted = shiftDays(new Date("2025-03-30T08:00:00Z"), 7);
    expect(shifted.toISOString()).toBe("2025-04-06T08:00:00.000Z");
  });
});
