/**
 * CLI UI - Re-exports from ui/ subdirectory
 */

export type { SummaryItem } from "./ui/index";
export {
  banner,
  cancel,
  color,
  confirm,
  error,
  formatPhase,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  info,
  intro,
  isCancel,
  message,
  NAME,
  note,
  outro,
  spinner,
  step,
  success,
  TABLE_WIDTHS,
  ui,
  VERSION,
  warn,
} from "./ui/index";
