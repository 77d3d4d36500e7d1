import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { summarizeActivity, summarizeDayLog } from "../src/session/recap.js";
import type { ActivityLog } from "../src/core/dayLog.js";

const MINUTE = 60 * 1000;
const at = (hours: number, minutes: number) => new Date(2024, 5, 3, hours, minutes);
const stamp = (hours: number, minutes: number) =>
  `2024-06-03T${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}:00`;

describe("summarizeActivity", () => {
  it("完了したセッションの時間を合計する", () => {
    const log: ActivityLog = [
      { action: "start", time: stamp(9, 0) },
      { action: "stop", time: stamp(9, 25) },
    ];
    assert.deepEqual(summarizeActivity("reading", log, at(12, 0)), {
      activity: "reading",
      totalMs: 25 * MINUTE,
      finishedSessions: 1,
      ongoingSessions: 0,
      irregular: false,
    });
  });

  it("進行中のセッションは now までを加算する", () => {
    const log: ActivityLog = [{ action: "start", time: stamp(9, 0) }];
    const row = summarizeActivity("reading", log, at(9, 10));
    assert.equal(row.totalMs, 10 * MINUTE);
    assert.equal(row.finishedSessions, 0);
    assert.equal(row.ongoingSessions, 1);
  });

  it("完了と進行中のセッションを両方数える", () => {
    const log: ActivityLog = [
      { action: "start", time: stamp(9, 0) },
      { action: "stop", time: stamp(9, 25) },
      { action: "start", time: stamp(10, 0) },
    ];
    const row = summarizeActivity("reading", log, at(10, 5));
    assert.equal(row.totalMs, 30 * MINUTE);
    assert.equal(row.finishedSessions, 1);
    assert.equal(row.ongoingSessions, 1);
    assert.equal(row.irregular, false);
  });

  it("交互になっていないログも計算はするが irregular を立てる", () => {
    const log: ActivityLog = [
      { action: "start", time: stamp(9, 0) },
      { action: "start", time: stamp(9, 20) },
    ];
    const row = summarizeActivity("reading", log, at(10, 0));
    assert.equal(row.totalMs, 20 * MINUTE);
    assert.equal(row.finishedSessions, 1);
    assert.equal(row.irregular, true);
  });

  it("now より後に始まった進行中セッションは 0 として数える", () => {
    const log: ActivityLog = [
      { action: "start", time: stamp(9, 0) },
      { action: "stop", time: stamp(9, 25) },
      { action: "start", time: stamp(15, 0) },
    ];
    const row = summarizeActivity("reading", log, at(13, 0));
    assert.equal(row.totalMs, 25 * MINUTE);
    assert.equal(row.ongoingSessions, 1);
  });
});

describe("summarizeDayLog", () => {
  it("アクションのある activity ごとに1行を返す", () => {
    const rows = summarizeDayLog(
      {
        date: "2024-06-03",
        activities: {
          reading: [
            { action: "start", time: stamp(9, 0) },
            { action: "stop", time: stamp(9, 25) },
          ],
          writing: [],
          coding: [{ action: "start", time: stamp(11, 0) }],
        },
      },
      at(11, 45)
    );
    assert.deepEqual(
      rows.map((row) => [row.activity, row.totalMs / MINUTE, row.finishedSessions, row.ongoingSessions]),
      [
        ["reading", 25, 1, 0],
        ["coding", 45, 0, 1],
      ]
    );
  });
});
