export { systemClock } from "./system-clock.js";
export { realTimerService } from "./real-timers.js";
export {
  createProcessSignalHandler,
  type ProcessSignalOptions,
  type SignalSource,
} from "./process-signals.js";
export { createHttpSource, type FetchLike, type HttpSourceOptions } from "./http-source.js";
export { createFileSink, openFileSink } from "./file-sink.js";
export {
  USAGE_RECORD_NAME,
  createUsageFileStore,
  measureArea,
  parseUsageRecord,
  readUsage,
  rebuildUsage,
  recordGrowth,
  usageRecordPath,
  writeUsage,
  type UsageRecord,
} from "./usage-file.js";
