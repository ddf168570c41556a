// CHANGE: Write matched/unmatched repositories to timestamped CSV files.
// WHY: A failed report write is logged and skipped; the audit run itself still succeeds.

import fs from "fs-extra";
import path from "path";
import sanitize from "sanitize-filename";
import { REPORT } from "./config.js";
import { error as logError, info } from "./logger.js";
import { ReportOutcome } from "./types.js";

export type Scalar = string | number | boolean | null | undefined;

export type LineItem = Scalar | readonly Scalar[];

export interface ReportOptions {
  readonly outputDir?: string;
  readonly now?: Date;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Local wall-clock time as `YYYYMMDD_HHMMSS`.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Resolve `<outputDir>/<prefix>_<timestamp>.csv`.
 *
 * @throws Error when the prefix has no usable file-name characters.
 */
export function reportPath(prefix: string, options: ReportOptions = {}): string {
  const safePrefix = sanitize(prefix);
  if (safePrefix.length === 0) {
    throw new Error(`Invalid report prefix: "${prefix}"`);
  }
  const fileName = `${safePrefix}_${formatTimestamp(options.now ?? new Date())}${REPORT.EXTENSION}`;
  return path.join(options.outputDir ?? REPORT.OUTPUT_DIR, fileName);
}

/**
 * Render one CSV field, quoting only values that contain a delimiter, quote or line break.
 */
export function csvField(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function describeError(rawError: unknown): string {
  return rawError instanceof Error ? rawError.message : String(rawError);
}

async function writeReport(prefix: string, options: ReportOptions, render: () => { content: string; rows: number }): Promise<ReportOutcome> {
  try {
    const filePath = reportPath(prefix, options);
    const { content, rows } = render();
    await fs.outputFile(filePath, content, "utf8");
    info(`Data has been written to ${filePath}`);
    return { ok: true, path: filePath, rows };
  } catch (rawError) {
    const reason = describeError(rawError);
    logError(`An error occurred while writing the ${prefix} report: ${reason}`);
    return { ok: false, prefix, reason };
  }
}

/**
 * Write records with a header row taken from the first record's field names.
 *
 * Fields missing from later records are written as empty values. An empty list has no
 * header to derive, so the write fails and no file is created.
 */
export async function writeRecordsReport<T extends object>(
  records: readonly T[],
  prefix: string,
  options: ReportOptions = {}
): Promise<ReportOutcome> {
  return writeReport(prefix, options, () => {
    const first = records[0];
    if (first === undefined) {
      throw new Error("no records to derive a header from");
    }
    const headers = Object.keys(first);
    const lines = [headers.map(csvField).join(",")];
    for (const record of records) {
      const fields = new Map<string, unknown>(Object.entries(record));
      lines.push(headers.map(header => csvField(fields.get(header))).join(","));
    }
    return { content: `${lines.join("\n")}\n`, rows: records.length };
  });
}

/**
 * Write one line per item without a header: lists are comma-joined, scalars written as-is.
 */
export async function writeLinesReport(
  items: readonly LineItem[],
  prefix: string,
  options: ReportOptions = {}
): Promise<ReportOutcome> {
  return writeReport(prefix, options, () => {
    const lines = items.map(item => (Array.isArray(item) ? item.map(csvField).join(",") : csvField(item)));
    return { content: lines.map(line => `${line}\n`).join(""), rows: items.length };
  });
}
