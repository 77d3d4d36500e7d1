import { formatDuration as formatDurationFns } from "date-fns";
import type { ActivityLog } from "../core/dayLog.js";
import type { RecapRow } from "../session/recap.js";

const RECAP_HEADERS = ["Activity", "Total Time", "Finished Sessions", "Ongoing Sessions"];

export function formatDuration(ms: number): string {
  const sign = ms < 0 ? "-" : "";
  const totalSeconds = Math.floor(Math.abs(ms) / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const text = formatDurationFns({ hours, minutes, seconds });
  return text ? `${sign}${text}` : "0 minutes";
}

export function renderActivityLog(log: ActivityLog): string {
  return JSON.stringify(log, null, 2);
}

export function renderRecapTable(rows: RecapRow[]): string {
  if (rows.length === 0) return "(no activities)";

  const body = rows.map((row) => [
    row.irregular ? `${row.activity} (!)` : row.activity,
    formatDuration(row.totalMs),
    String(row.finishedSessions),
    String(row.ongoingSessions),
  ]);
  return renderTable(RECAP_HEADERS, body);
}

export function renderTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length))
  );
  const line = (left: string, fill: string, join: string, right: string) =>
    `${left}${widths.map((width) => fill.repeat(width + 2)).join(join)}${right}`;
  const cells = (values: string[]) =>
    `│${widths.map((width, column) => ` ${(values[column] ?? "").padEnd(width)} `).join("│")}│`;

  const out = [line("╒", "═", "╤", "╕"), cells(headers), line("╞", "═", "╪", "╡")];
  rows.forEach((row, index) => {
    if (index > 0) out.push(line("├", "─", "┼", "┤"));
    out.push(cells(row));
  });
  out.push(line("╘", "═", "╧", "╛"));
  return out.join("\n");
}
