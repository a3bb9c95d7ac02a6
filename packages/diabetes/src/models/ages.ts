/**
 * Sensor and reservoir ages read from the navigation menu
 */

export interface SensorInfo {
  /** Serial or device name shown next to the brand, if any */
  serial: string | null;
  /** When the sensor was inserted (Unix ms) */
  startTime: number;
  /** When the sensor session ends (Unix ms) */
  endTime: number | null;
  /** Raw duration text the start time was derived from */
  durationText: string;
}

export interface InsulinInfo {
  /** When the reservoir was filled (Unix ms) */
  fillTime: number;
  /** Raw duration text the fill time was derived from */
  durationText: string;
}

export interface AgeInfo {
  sensor: SensorInfo | null;
  insulin: InsulinInfo | null;
}
