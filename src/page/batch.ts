// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { readEntries } from "./csv.js";
import { processEntry } from "./generate.js";
import type {
  BatchOptions,
  BatchSummary,
  GenerationConfig,
  GenerationResult,
  QrEntry,
} from "./types.js";

/**
 * Generate one page per entry, in input order.
 *
 * Entries are processed one at a time, each written before the next
 * starts. A failing entry is recorded in the summary and never stops the
 * run. When two titles sanitize to the same filename the later one gets a
 * `-2`, `-3`, … suffix.
 *
 * @example
 * ```ts
 * const summary = await runBatch(entries, resolveConfig({ outputDirectory: "./output" }), {
 *   onProgress: ({ index, total, entry }) => console.log(`${index}/${total} ${entry.title}`),
 * });
 * console.log(`${summary.succeeded}/${summary.total} pages written`);
 * ```
 */
export async function runBatch(
  entries: readonly QrEntry[],
  config: GenerationConfig,
  options: BatchOptions = {},
): Promise<BatchSummary> {
  const taken = new Set<string>();
  const results: GenerationResult[] = [];

  for (const [i, entry] of entries.entries()) {
    const progress = { index: i + 1, total: entries.length, entry };
    options.onProgress?.(progress);
    const result = await processEntry(entry, config, taken);
    options.onResult?.(result, progress);
    results.push(result);
  }

  return summarize(results);
}

/**
 * Read entries from a CSV file and run them as a batch.
 *
 * @throws {FatalInputError} if the CSV cannot be read or lacks a `Title`/`URL` header;
 *   nothing is written in that case
 */
export async function runBatchFromCsv(
  csvPath: string,
  config: GenerationConfig,
  options: BatchOptions = {},
): Promise<BatchSummary> {
  const entries = readEntries(csvPath);
  return runBatch(entries, config, options);
}

/**
 * Fold per-entry results into a {@link BatchSummary}.
 */
export function summarize(results: readonly GenerationResult[]): BatchSummary {
  return results.reduce<BatchSummary>(
    (summary, result) => {
      summary.results.push(result);
      for (const warning of result.warnings) {
        if (!summary.warnings.includes(warning)) summary.warnings.push(warning);
      }
      if (result.status === "success") {
        summary.succeeded++;
      } else {
        summary.failed++;
        summary.failures.push({ entry: result.entry, reason: result.reason });
      }
      return summary;
    },
    {
      total: results.length,
      succeeded: 0,
      failed: 0,
      failures: [],
      results: [],
      warnings: [],
    },
  );
}
