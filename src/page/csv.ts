// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { readFileSync } from "node:fs";
import { parse } from "csv-parse/sync";
import { FatalInputError } from "../errors.js";
import type { QrEntry } from "./types.js";

export const TITLE_HEADER = "Title";
export const URL_HEADER = "URL";

/**
 * Parse CSV text into entries.
 *
 * The first record is the header and must contain `Title` and `URL`
 * (case-sensitive; other columns are ignored). Blank lines are skipped.
 * A row too short to reach a column gets `""` for it, which the drivers
 * report as a malformed row. Each entry records its 1-based data row
 * number (the header is not counted).
 *
 * @throws {FatalInputError} if the text is not valid CSV, is empty, or lacks a required header
 */
export function parseEntries(text: string): QrEntry[] {
  let records: string[][];
  try {
    records = parse(text, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (err) {
    throw new FatalInputError(
      `Invalid CSV: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const [header, ...rows] = records;
  if (header === undefined) {
    throw new FatalInputError(`CSV is empty; expected a header row with ${TITLE_HEADER} and ${URL_HEADER}`);
  }

  const columns = header.map((name) => name.trim());
  const titleIndex = columns.indexOf(TITLE_HEADER);
  const urlIndex = columns.indexOf(URL_HEADER);
  const missing = [
    ...(titleIndex === -1 ? [TITLE_HEADER] : []),
    ...(urlIndex === -1 ? [URL_HEADER] : []),
  ];
  if (missing.length > 0) {
    throw new FatalInputError(
      `CSV is missing required header(s): ${missing.join(", ")} (found: ${columns.join(", ") || "none"})`,
    );
  }

  return rows.map((record, i) => ({
    title: record[titleIndex] ?? "",
    url: record[urlIndex] ?? "",
    row: i + 1,
  }));
}

/**
 * Read a UTF-8 CSV file and parse it with {@link parseEntries}.
 *
 * @throws {FatalInputError} if the file cannot be read or parsed
 */
export function readEntries(csvPath: string): QrEntry[] {
  let text: string;
  try {
    text = readFileSync(csvPath, "utf8");
  } catch (err) {
    throw new FatalInputError(
      `Cannot read CSV file ${csvPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseEntries(text);
}
