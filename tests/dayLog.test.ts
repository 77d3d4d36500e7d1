import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  createAction,
  createDayLog,
  isSameAction,
  lastAction,
  parseTimestamp,
  sessionStateOf,
  toDateKey,
  toTimestamp,
} from "../src/core/dayLog.js";

describe("dayLog helpers", () => {
  it("ローカル時刻で日付キーとタイムスタンプを作る", () => {
    const moment = new Date(2024, 5, 3, 9, 5, 7);
    assert.equal(toDateKey(moment), "2024-06-03");
    assert.equal(toTimestamp(moment), "2024-06-03T09:05:07");
  });

  it("オフセットなしのタイムスタンプをローカル時刻として読む", () => {
    const parsed = parseTimestamp("2024-06-03T09:05:07");
    assert.equal(parsed.getTime(), new Date(2024, 5, 3, 9, 5, 7).getTime());
  });

  it("createDayLog は空の activities を持つ", () => {
    assert.deepEqual(createDayLog("2024-06-03"), { date: "2024-06-03", activities: {} });
  });

  it("最後のアクションから状態を判定する", () => {
    const start = createAction("start", new Date(2024, 5, 3, 9, 0));
    const stop = createAction("stop", new Date(2024, 5, 3, 9, 25));
    assert.equal(sessionStateOf(undefined), "absent");
    assert.equal(sessionStateOf([]), "absent");
    assert.equal(sessionStateOf([start]), "running");
    assert.equal(sessionStateOf([start, stop]), "stopped");
    assert.deepEqual(lastAction([start, stop]), stop);
    assert.equal(lastAction([]), null);
  });

  it("種類と時刻が同じときだけ同一アクションとみなす", () => {
    const a = createAction("start", new Date(2024, 5, 3, 9, 0));
    assert.equal(isSameAction(a, { action: "start", time: "2024-06-03T09:00:00" }), true);
    assert.equal(isSameAction(a, { action: "stop", time: "2024-06-03T09:00:00" }), false);
    assert.equal(isSameAction(a, { action: "start", time: "2024-06-03T09:01:00" }), false);
  });
});
