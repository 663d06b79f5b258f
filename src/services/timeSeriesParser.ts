import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";

import { NotFoundError, SourceUnavailableError, describeError } from "../core/errors";
import type { DroppedRecord, ParseReport, RawBar, RecordOutcome } from "../types/models";
import { parseBarTimestamp } from "../utils/time";

const MIN_FIELDS = 8;
const TIMESTAMP_FIELD = 0;
const CLOSE_FIELD = 4;
const REAL_VOLUME_FIELD = 7;

const DECIMAL_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_LITERAL = /^[+-]?\d+$/;

const csvRowsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number() })
  })
);

export const historyFileName = (ticker: string): string => `${ticker}_D1.csv`;

const parsePrice = (text: string): number | null => {
  if (!DECIMAL_LITERAL.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
};

const parseVolume = (text: string): number | null => {
  if (!INTEGER_LITERAL.test(text)) return null;
  const value = Number(text);
  return Number.isSafeInteger(value) && value >= 0 ? value : null;
};

const isHeader = (fields: string[]): boolean => (fields[0] ?? "").includes("Time");

/**
 * Decides what happens to one delimited record. A bad timestamp or close price
 * drops the record; a bad volume only zeroes the volume.
 */
export const classifyRecord = (fields: string[], lineNumber: number): RecordOutcome => {
  const drop = (reason: DroppedRecord["reason"]): RecordOutcome => ({
    status: "dropped",
    record: { lineNumber, reason }
  });

  if (fields.length < MIN_FIELDS) return drop("too_few_fields");

  const openedAtMs = parseBarTimestamp(fields[TIMESTAMP_FIELD]);
  if (openedAtMs === null) return drop("invalid_timestamp");

  const price = parsePrice(fields[CLOSE_FIELD]);
  if (price === null) return drop("invalid_price");
  if (price < 0) return drop("negative_price");

  const volume = parseVolume(fields[REAL_VOLUME_FIELD]);
  const bar: RawBar = { lineNumber, openedAtMs, price, volume: volume ?? 0 };
  return { status: "kept", bar, volumeDefaulted: volume === null };
};

export class TimeSeriesParser {
  constructor(private readonly dataDir: string) {}

  pathFor(ticker: string): string {
    return join(this.dataDir, historyFileName(ticker));
  }

  private async readSource(ticker: string): Promise<string> {
    const context = { operation: "readHistory", ticker };
    if (ticker === "." || ticker === ".." || /[/\\\0]/.test(ticker)) {
      throw new NotFoundError(
        `price history file not found for ticker ${ticker}`,
        "history_file",
        context
      );
    }

    try {
      return await readFile(this.pathFor(ticker), "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new NotFoundError(
          `price history file not found for ticker ${ticker}`,
          "history_file",
          context
        );
      }
      throw new SourceUnavailableError(
        `error reading price history file for ticker ${ticker}: ${describeError(error)}`,
        context,
        error
      );
    }
  }

  private decode(ticker: string, source: string): z.infer<typeof csvRowsSchema> {
    try {
      return csvRowsSchema.parse(
        parse(source, {
          bom: true,
          info: true,
          relax_column_count: true,
          relax_quotes: true,
          skip_empty_lines: true
        })
      );
    } catch (error) {
      throw new SourceUnavailableError(
        `error decoding price history file for ticker ${ticker}: ${describeError(error)}`,
        { operation: "readHistory", ticker },
        error
      );
    }
  }

  /** Reads `<ticker>_D1.csv` and keeps every record that yields a usable bar. */
  async parse(ticker: string): Promise<ParseReport> {
    const rows = this.decode(ticker, await this.readSource(ticker));
    const report: ParseReport = {
      ticker,
      totalRecords: rows.length,
      headerSkipped: false,
      bars: [],
      dropped: [],
      volumeDefaulted: 0
    };

    rows.forEach(({ record, info }, index) => {
      if (index === 0 && isHeader(record)) {
        report.headerSkipped = true;
        return;
      }
      const outcome = classifyRecord(record, info.lines);
      if (outcome.status === "dropped") {
        report.dropped.push(outcome.record);
        return;
      }
      report.bars.push(outcome.bar);
      if (outcome.volumeDefaulted) report.volumeDefaulted += 1;
    });

    return report;
  }
}
