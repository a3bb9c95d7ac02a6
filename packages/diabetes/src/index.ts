/**
 * @pumpscreen/diabetes
 *
 * Reading model, unit handling, statistics and the DynamoDB reading store
 *
 * @example
 * ```typescript
 * import { createGlucoseReading, createReadingStore, createDocClient } from "@pumpscreen/diabetes";
 *
 * const result = createGlucoseReading({ value: 142, unit: "mg/dL", trend: "flat", source, timestamp });
 * if (result.ok) await createReadingStore(createDocClient(), "readings").save(result.reading);
 * ```
 */

// Models - Type definitions
export * from "./models/index.js";

// Validation - the only GlucoseReading constructor
export * from "./validation.js";

// Units and trend directions
export * from "./units.js";

// Calendar helpers
export * from "./time.js";

// zod schemas for snapshots and stored items
export * from "./schemas.js";

// Storage - DynamoDB operations
export * from "./storage/index.js";

// Analysis - time in range and averages
export * from "./analysis/index.js";
