/**
 * Resource and job naming utilities
 */

import { generateShortId } from "./crypto";

/** DNS-1123 label, the shape of policy, namespace and job names */
export const RESOURCE_NAME_PATTERN = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;
export const MAX_NAME_LENGTH = 63;

// Pattern: policyname-yyyymmddhhmmssSSS-shortid
export const JOB_NAME_PATTERN = /^([a-z0-9](?:[a-z0-9-]*[a-z0-9])?)-(\d{17})-([a-z0-9]{6})$/;

const TIMESTAMP_LENGTH = 17;
const SHORT_ID_LENGTH = 6;

export interface ParsedJobName {
  policyName: string;
  timestamp: string;
  shortId: string;
}

export function isValidResourceName(name: string): boolean {
  return name.length <= MAX_NAME_LENGTH && RESOURCE_NAME_PATTERN.test(name);
}

/**
 * Compact UTC timestamp with millisecond resolution: 20261019013000123
 */
export function formatJobTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:TZ.]/g, "");
}

export function generateJobName(
  policyName: string,
  now: Date,
  shortId: string = generateShortId(SHORT_ID_LENGTH),
): string {
  const reserved = TIMESTAMP_LENGTH + SHORT_ID_LENGTH + 2;
  const base = policyName.slice(0, MAX_NAME_LENGTH - reserved).replace(/-+$/, "");

  return `${base}-${formatJobTimestamp(now)}-${shortId}`;
}

export function parseJobName(jobName: string): ParsedJobName | null {
  const match = jobName.match(JOB_NAME_PATTERN);
  if (!match) return null;

  const [, policyName, timestamp, shortId] = match;
  if (policyName === undefined || timestamp === undefined || shortId === undefined) {
    return null;
  }

  return { policyName, timestamp, shortId };
}
