import * as fs from "fs";
import * as path from "path";
import { logger } from "./logger";
import { classify, DEFAULT_THRESHOLDS } from "./health-classifier";
import type { ClassifiedRepositoryRecord, HealthThresholds, RawRepositoryRecord } from "../types/github";

export interface ReportSummary {
  total: number;
  healthy: number;
  outdated: number;
  broken: number;
}

/**
 * Map fetched records to the persisted shape, keeping fetch order.
 * Every record is classified against the same instant.
 */
export function assembleReport(
  records: readonly RawRepositoryRecord[],
  now: Date,
  thresholds: HealthThresholds = DEFAULT_THRESHOLDS
): ClassifiedRepositoryRecord[] {
  return records.map((record) => {
    const { is_outdated, is_broken } = classify(record, now, thresholds);
    return {
      name: record.fullName,
      url: record.url,
      description: record.description,
      stars: record.stars,
      open_issues: record.openIssues,
      last_push: record.pushedAt,
      created_at: record.createdAt,
      is_outdated,
      is_broken,
    };
  });
}

export function summarizeReport(report: readonly ClassifiedRepositoryRecord[]): ReportSummary {
  let outdated = 0;
  let broken = 0;
  let healthy = 0;

  for (const entry of report) {
    if (entry.is_outdated) outdated++;
    if (entry.is_broken) broken++;
    if (!entry.is_outdated && !entry.is_broken) healthy++;
  }

  return { total: report.length, healthy, outdated, broken };
}

/**
 * Save the report as pretty-printed JSON, creating parent directories
 */
export async function saveReport(
  report: readonly ClassifiedRepositoryRecord[],
  outputFile: string
): Promise<string> {
  const dir = path.dirname(outputFile);
  await fs.promises.mkdir(dir, { recursive: true });
  await fs.promises.writeFile(outputFile, JSON.stringify(report, null, 2), "utf-8");
  logger.info(`Results saved to ${outputFile}`);
  return outputFile;
}

/**
 * Format and display report entries
 */
export function displayReport(report: readonly ClassifiedRepositoryRecord[]) {
  report.forEach((entry, index) => {
    console.log(`\nChecked: ${entry.name} (${index + 1}/${report.length})`);
    console.log(`  URL: ${entry.url}`);
    console.log(`  Description: ${entry.description ?? "No description"}`);
    console.log(`  Stars: ${entry.stars.toLocaleString()}`);
    console.log(`  Open Issues: ${entry.open_issues}`);
    console.log(`  Created: ${entry.created_at}`);
    console.log(`  Last Push: ${entry.last_push ?? "never"}`);
    console.log(`  Outdated: ${entry.is_outdated ? "Yes" : "No"}`);
    console.log(`  Potentially Broken: ${entry.is_broken ? "Yes" : "No"}`);
  });
}
