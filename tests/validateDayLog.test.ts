import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { ZodError } from "zod";
import { isDayLog, parseDayLog } from "../src/core/validateDayLog.js";
import type { DayLog } from "../src/core/dayLog.js";

const baseLog: DayLog = {
  date: "2024-06-03",
  activities: {
    reading: [
      { action: "start", time: "2024-06-03T09:00:00" },
      { action: "stop", time: "2024-06-03T09:25:00" },
    ],
  },
};

describe("DayLog schema validator", () => {
  it("有効なログをtrueと判定する", () => {
    assert.ok(isDayLog(baseLog));
    assert.deepEqual(parseDayLog(baseLog), baseLog);
  });

  it("マイクロ秒付きのタイムスタンプも受け付ける", () => {
    const log = {
      date: "2024-06-03",
      activities: { reading: [{ action: "start", time: "2024-06-03T09:00:00.123456" }] },
    };
    assert.ok(isDayLog(log));
  });

  it("未知の action や壊れた time はfalse", () => {
    const badKind = {
      ...baseLog,
      activities: { reading: [{ action: "pause", time: "2024-06-03T09:00:00" }] },
    };
    assert.equal(isDayLog(badKind), false);

    const badTime = {
      ...baseLog,
      activities: { reading: [{ action: "start", time: "9am" }] },
    };
    assert.equal(isDayLog(badTime), false);
  });

  it("date の形式が違うと ZodError を投げる", () => {
    assert.throws(() => parseDayLog({ ...baseLog, date: "06-03-24" }), ZodError);
  });
});
