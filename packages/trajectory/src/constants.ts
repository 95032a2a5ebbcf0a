/**
 * Constants for @trajecta/trajectory.
 */

export const PACKAGE_NAME = "@trajecta/trajectory";
export const DEFAULT_WINDOW_SIZE = 50;
export const DEFAULT_MIN_SAMPLES = 3;
export const DEFAULT_HORIZON_SECONDS = 30;
export const DEFAULT_TREND_THRESHOLD = 0.05; // per second

// Intervention cascade thresholds
export const DEFAULT_RISING_ACTIVATION_VELOCITY = 0.3; // per second
export const DEFAULT_CONSISTENCY_VELOCITY_FLOOR = -0.25; // per second
export const DEFAULT_ACTIVATION_CEILING = 0.85;
export const DEFAULT_SOCIAL_VELOCITY_FLOOR = -0.4; // per second

// Escalation levels, applied to current activation energy
export const DEFAULT_CRISIS_ACTIVATION = 0.8;
export const DEFAULT_ESCALATING_ACTIVATION = 0.6;
export const DEFAULT_STABLE_ACTIVATION = 0.3;

// Intervention window: max(BASE - activation * SLOPE, FLOOR) seconds
export const INTERVENTION_WINDOW_BASE_SECONDS = 60;
export const INTERVENTION_WINDOW_SLOPE_SECONDS = 40;
export const INTERVENTION_WINDOW_FLOOR_SECONDS = 10;
