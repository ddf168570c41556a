// CHANGE: Verify report layout and that write failures are reported instead of thrown.

import fs from "fs-extra";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  csvField,
  formatTimestamp,
  reportPath,
  writeLinesReport,
  writeRecordsReport
} from "../src/reporter.js";

const now = new Date(2024, 0, 2, 3, 4, 5);

describe("formatTimestamp", () => {
  it("renders local time as YYYYMMDD_HHMMSS", () => {
    expect(formatTimestamp(now)).toBe("20240102_030405");
    expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe("20231231_235958");
  });
});

describe("reportPath", () => {
  it("joins directory, prefix and timestamp", () => {
    expect(reportPath("output-found", { outputDir: "reports", now })).toBe(
      path.join("reports", "output-found_20240102_030405.csv")
    );
  });

  it("strips characters that are not allowed in file names", () => {
    expect(reportPath("team/a:b", { outputDir: "reports", now })).toBe(
      path.join("reports", "teamab_20240102_030405.csv")
    );
  });
});

describe("csvField", () => {
  it("writes plain values verbatim", () => {
    expect(csvField("https://github.com/acme/a")).toBe("https://github.com/acme/a");
    expect(csvField(7)).toBe("7");
  });

  it("renders missing values as empty", () => {
    expect(csvField(undefined)).toBe("");
    expect(csvField(null)).toBe("");
  });

  it("quotes values containing delimiters or quotes", () => {
    expect(csvField("a,b")).toBe('"a,b"');
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
  });
});

describe("report writers", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "scan-coverage-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it("writes a header from the first record followed by one row per record", async () => {
    const outcome = await writeRecordsReport(
      [
        { name: "a", url: "https://github.com/acme/a" },
        { name: "b", url: "https://github.com/acme/b" }
      ],
      "output-found",
      { outputDir: dir, now }
    );

    const expectedPath = path.join(dir, "output-found_20240102_030405.csv");
    expect(outcome).toEqual({ ok: true, path: expectedPath, rows: 2 });
    expect(await fs.readFile(expectedPath, "utf8")).toBe(
      "name,url\na,https://github.com/acme/a\nb,https://github.com/acme/b\n"
    );
  });

  it("renders fields missing from later records as empty values", async () => {
    const outcome = await writeRecordsReport([{ name: "a", url: "u" }, { name: "b" }], "partial", {
      outputDir: dir,
      now
    });

    expect(outcome.ok).toBe(true);
    expect(await fs.readFile(path.join(dir, "partial_20240102_030405.csv"), "utf8")).toBe("name,url\na,u\nb,\n");
  });

  it("logs and skips an empty record list without creating a file", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const outcome = await writeRecordsReport([], "output-found", { outputDir: dir, now });

    expect(outcome).toEqual({
      ok: false,
      prefix: "output-found",
      reason: "no records to derive a header from"
    });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(await fs.pathExists(path.join(dir, "output-found_20240102_030405.csv"))).toBe(false);
  });

  it("reports an I/O failure instead of throwing", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(blocker, "not a directory");

    const outcome = await writeLinesReport(["a"], "output-found", { outputDir: path.join(blocker, "nested"), now });

    expect(outcome.ok).toBe(false);
  });

  it("writes bare lines and comma-joins list items", async () => {
    const outcome = await writeLinesReport(["a", ["x", "y,z"], 3], "output-notfound", { outputDir: dir, now });

    expect(outcome).toMatchObject({ ok: true, rows: 3 });
    expect(await fs.readFile(path.join(dir, "output-notfound_20240102_030405.csv"), "utf8")).toBe('a\nx,"y,z"\n3\n');
  });

  it("writes an empty file for an empty line list", async () => {
    const outcome = await writeLinesReport([], "output-found", { outputDir: dir, now });

    expect(outcome).toMatchObject({ ok: true, rows: 0 });
    expect(await fs.readFile(path.join(dir, "output-found_20240102_030405.csv"), "utf8")).toBe("");
  });

  it("rejects a prefix with no usable characters", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    const outcome = await writeLinesReport(["a"], "///", { outputDir: dir, now });

    expect(outcome).toEqual({ ok: false, prefix: "///", reason: 'Invalid report prefix: "///"' });
  });
});
