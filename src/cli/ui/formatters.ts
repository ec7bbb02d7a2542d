/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { BackupPhase } from "../../types";

export const TABLE_WIDTHS = {
  namespace: 12,
  name: 24,
  schedule: 16,
  status: 10,
  lastSuccess: 20,
  nextRun: 20,
  activeJob: 36,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const maxLabelLen = Math.max(...items.map((i) => i.label.length));
  return items
    .filter((i) => i.value !== null && i.value !== undefined)
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns
    .map((col, i) => col.padEnd(widths[i] ?? 0))
    .join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/**
 * Phase label coloured by outcome; "-" before the first pass
 */
export function formatPhase(phase: BackupPhase | null): string {
  switch (phase) {
    case null:
      return "-";
    case "Succeeded":
      return color.green(phase);
    case "Running":
      return color.cyan(phase);
    case "Pending":
      return color.dim(phase);
    case "Failed":
    case "Error":
      return color.red(phase);
  }
}
