import { renderStatusTable, statusRows } from "../status-view.js";
import { emptyStatusDocument, type StatusDocument } from "../types.js";
import { mkFailure, mkJob, mkResult } from "./util";

describe("status view", () => {
  const doc: StatusDocument = {
    ...emptyStatusDocument(),
    jobs: {
      photos: mkResult("photos", {
        stats: { total_files: "1,204", transferred_size: "52,000 bytes" },
      }),
      music: mkFailure("music"),
      old: mkFailure("old", "Timeout after 1 hour", { outcome: "timed_out" }),
    },
    last_run: "2026-10-19T08:00:00.000Z",
    total_runs: 4,
    last_summary: { total: 2, successful: 1, failed: 1 },
  };

  it("lists configured jobs then removed ones", () => {
    const jobs = [
      mkJob("photos"),
      mkJob("music"),
      mkJob("docs", { enabled: false }),
    ];
    expect(statusRows(doc, jobs)).toEqual([
      [
        "photos",
        "yes",
        "ok",
        "2026-10-19T08:00:00.000Z",
        "1.5s",
        "1,204",
        "52,000 bytes",
        "",
      ],
      ["music", "yes", "failed", "2026-10-19T08:00:00.000Z", "1.5s", "-", "-", ""],
      ["docs", "no", "never run", "-", "-", "-", "-", ""],
      [
        "old",
        "removed",
        "timed_out",
        "2026-10-19T08:00:00.000Z",
        "1.5s",
        "-",
        "-",
        "Timeout after 1 hour",
      ],
    ]);
  });

  it("ends the table with batch totals", () => {
    const lines = renderStatusTable(doc, [mkJob("photos")]).split("\n");
    expect(lines.slice(-3)).toEqual([
      "Last run: 2026-10-19T08:00:00.000Z",
      "Total runs: 4",
      "Last batch: 1 ok, 1 failed of 2",
    ]);
  });

  it("renders an empty document", () => {
    const lines = renderStatusTable(emptyStatusDocument(), []).split("\n");
    expect(lines.slice(-3)).toEqual([
      "Last run: never",
      "Total runs: 0",
      "Last batch: none",
    ]);
  });
});
