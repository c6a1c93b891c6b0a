import { config } from "./config";
import type { HealthFlags, HealthThresholds, RawRepositoryRecord } from "../types/github";

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_THRESHOLDS: HealthThresholds = {
  outdatedThresholdDays: 365,
  brokenIssuesThreshold: 10,
  brokenThresholdDays: 180,
};

export function configuredThresholds(): HealthThresholds {
  return { ...config.health };
}

/**
 * Milliseconds since the last push, or null when the push date is unknown
 */
export function inactivityMs(record: Pick<RawRepositoryRecord, "pushedAt">, now: Date): number | null {
  if (!record.pushedAt) return null;
  const pushed = Date.parse(record.pushedAt);
  return isNaN(pushed) ? null : now.getTime() - pushed;
}

/**
 * Classify a repository against the thresholds at a fixed instant.
 * Repositories without a usable push date are never flagged.
 */
export function classify(
  record: Pick<RawRepositoryRecord, "pushedAt" | "openIssues">,
  now: Date,
  thresholds: HealthThresholds = DEFAULT_THRESHOLDS
): HealthFlags {
  const inactive = inactivityMs(record, now);
  if (inactive === null) {
    return { is_outdated: false, is_broken: false };
  }

  return {
    is_outdated: inactive > thresholds.outdatedThresholdDays * DAY_MS,
    is_broken:
      record.openIssues > thresholds.brokenIssuesThreshold &&
      inactive > thresholds.brokenThresholdDays * DAY_MS,
  };
}
