export const PACKAGE_NAME = "@trajecta/test-utils" as const;

export {
  BASE_VALUES,
  type DimensionOverrides,
  lensReading,
  STRESS_ESCALATION,
  snapshotAt,
  stressEscalationSeries,
  vectorOf,
} from "./fixtures.js";
export { type LogEntry, RecordingLogger } from "./recording-logger.js";
export { type RecordedValue, RecordingMeter } from "./recording-meter.js";
