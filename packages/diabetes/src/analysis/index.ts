export {
  TARGET,
  classifyGlucose,
  calculateTimeInRange,
  calculateAverageGlucose,
  calculateGlucoseStats,
} from "./glucose-stats.js";
export type { RangeThresholds, TimeInRange, GlucoseStats } from "./glucose-stats.js";
