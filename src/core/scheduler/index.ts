export {
  Controller,
  type ControllerOptions,
  MAX_TIMER_MS,
  type QueueEntryStatus,
} from "./daemon";
export { isDue, type ParseScheduleOptions, parseSchedule, type Schedule } from "./cron-parser";
