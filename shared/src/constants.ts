// === Simulation tick rates ===
export const SIM_TICK_RATE = 10;              // Hz, activity/detection/heat steps
export const STATUS_BROADCAST_RATE = 2;       // Hz, push status to UI subscribers

// === Game time ===
export const TIME_SCALE = 60;                 // 1 real second = 1 game minute
export const GAME_HOUR_SECONDS = 3600;
export const GAME_DAY_SECONDS = 24 * 3600;    // seconds in one game day (86400)

// === Detection ===
export const DETECTION_MIN_DISTANCE = 0.001;  // avoids divide-by-zero in awareness
export const PATROL_JITTER_FRACTION = 0.1;    // ±10% on every patrol interval
export const MIN_DIAL_MULTIPLIER = 0.01;      // floor for patrol/sensitivity dials
export const DEFAULT_FACING = { x: 0, y: 0, z: 1 } as const;

export const SEVERITY_BASE = 0.5;
export const SEVERITY_ILLEGAL_BONUS = 0.3;
export const SEVERITY_LAW_ENFORCEMENT_BONUS = 0.2;
export const SEVERITY_AUTHORITY_BONUS = 0.2;

// === Activities ===
export const PERFORMANCE_START = 50;
export const PERFORMANCE_DEFAULT_SAMPLE = 50;
export const PERFORMANCE_SAMPLE_WEIGHT = 0.1; // EMA weight for each new sample
export const DETECTION_PERFORMANCE_PENALTY = 0.2; // flat, on the 0-100 scale
export const MIN_ACTIVITY_DURATION_SECONDS = 1;
export const MAX_COMBINED_ATTENTION = 1.0;

// === Heat ===
export const HEAT_MAX = 100;
export const HEAT_THRESHOLDS = [30, 50, 70, 90] as const;
export const HEAT_BASE_DECAY_PER_HOUR = 1 / 24;  // 1 point per game day at 1×
export const HEAT_FRESH_DAYS = 1;             // < 1 day since last increase: 0.5×
export const HEAT_SETTLED_DAYS = 7;           // > 7 days: 2×
export const HEAT_STALE_DAYS = 30;            // > 30 days: 3×
export const HEAT_PER_DETECTION = 10;         // scaled by detection severity

export const PATROL_BOOST_THRESHOLD_30 = 1.2;
export const SURVEILLANCE_PATROL_MULTIPLIER = 1.5;
export const SURVEILLANCE_SENSITIVITY_MULTIPLIER = 1.3;
export const WARRANT_PATROL_MULTIPLIER = 2;
export const RAID_HEAT_FACTOR = 0.5;

// === Audit ===
export const AUDIT_LEGITIMACY_TRIGGER = 0.6;  // below this at 70 heat → audit
export const AUDIT_CLEAN_LEGITIMACY = 0.7;    // above this at resolution → cleared
export const AUDIT_FREEZE_FRACTION = 0.3;
export const AUDIT_FINE_FRACTION = 0.2;
export const AUDIT_DURATION_DAYS = 30;

// === Suspicious economy events ===
export const LARGE_DEPOSIT_THRESHOLD = 5000;
export const LARGE_DEPOSIT_HEAT_PER_10K = 5;
export const SUSPICIOUS_INCOME_HEAT = 2;
export const FLASHY_VANITY_THRESHOLD = 70;
export const FLASHY_HEAT_AT_MAX_VANITY = 10;

// === Persistence ===
export const SAVE_INTERVAL_SEC = 30;          // real seconds between snapshots
