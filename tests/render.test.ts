import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { formatDuration, renderActivityLog, renderRecapTable } from "../src/cli/render.js";

const MINUTE = 60 * 1000;

describe("formatDuration", () => {
  it("時間と分と秒を英語で表す", () => {
    assert.equal(formatDuration(25 * MINUTE), "25 minutes");
    assert.equal(formatDuration(65 * MINUTE), "1 hour 5 minutes");
    assert.equal(formatDuration(90 * 1000), "1 minute 30 seconds");
    assert.equal(formatDuration(0), "0 minutes");
    assert.equal(formatDuration(-MINUTE), "-1 minute");
  });
});

describe("renderRecapTable", () => {
  it("1行のテーブルを罫線付きで描く", () => {
    const table = renderRecapTable([
      {
        activity: "reading",
        totalMs: 25 * MINUTE,
        finishedSessions: 1,
        ongoingSessions: 0,
        irregular: false,
      },
    ]);
    assert.deepEqual(table.split("\n"), [
      "╒══════════╤════════════╤═══════════════════╤══════════════════╕",
      "│ Activity │ Total Time │ Finished Sessions │ Ongoing Sessions │",
      "╞══════════╪════════════╪═══════════════════╪══════════════════╡",
      "│ reading  │ 25 minutes │ 1                 │ 0                │",
      "╘══════════╧════════════╧═══════════════════╧══════════════════╛",
    ]);
  });

  it("行の間に区切り線を入れ、irregular な行に印を付ける", () => {
    const lines = renderRecapTable([
      { activity: "reading", totalMs: 0, finishedSessions: 0, ongoingSessions: 1, irregular: false },
      { activity: "coding", totalMs: MINUTE, finishedSessions: 1, ongoingSessions: 0, irregular: true },
    ]).split("\n");
    assert.equal(lines.length, 7);
    assert.equal(lines[4], "├────────────┼────────────┼───────────────────┼──────────────────┤");
    assert.equal(lines[5], "│ coding (!) │ 1 minute   │ 1                 │ 0                │");
  });

  it("activity が無ければその旨を返す", () => {
    assert.equal(renderRecapTable([]), "(no activities)");
  });
});

describe("renderActivityLog", () => {
  it("アクションを整形済み JSON で返す", () => {
    assert.equal(
      renderActivityLog([{ action: "start", time: "2024-06-03T09:00:00" }]),
      '[\n  {\n    "action": "start",\n    "time": "2024-06-03T09:00:00"\n  }\n]'
    );
  });
});
