/**
 * @pumpscreen/diabetes - Models
 */

export type { GlucoseUnit, GlucoseTrend, PumpDetails, PumpDetailField, GlucoseReading } from "./reading.js";
export { GLUCOSE_TRENDS } from "./reading.js";

export type { SensorInfo, InsulinInfo, AgeInfo } from "./ages.js";

export type { GraphTreatment, TimeLabel } from "./treatments.js";
export { hasInsulin, hasCarbs, hasBoth } from "./treatments.js";

export type { UiNode, BoundingBox, OcrBlock } from "./ui.js";
