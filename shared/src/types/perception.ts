export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export type ObserverRole = 'boss' | 'cop' | 'coworker' | 'security' | 'civilian';

/** Registration payload; the engine owns the patrol fields. */
export interface ObserverData {
  role: ObserverRole;
  position: Vec3;
  facing: Vec3;
  visionRange: number;
  visionConeDegrees: number;
  audioSensitivity: number;
  caresAboutLegality: boolean;
  caresAboutJobPerformance: boolean;
  currentLocation: string;
}

export interface Observer extends ObserverData {
  id: string;
  patrolWaypoints: Vec3[];
  patrolIntervalSeconds: number;
  currentWaypointIndex: number;
  nextPatrolTime: number;
}

export interface ActorPose {
  position: Vec3;
  locationId: string;
}

export interface RiskProfile {
  isLegal: boolean;
  /** How conspicuous the activity is; 0 means it cannot be seen at all */
  visualProfile: number;
  requiredAttention?: number;
  riskBearing?: boolean;
}

export type DetectionReason =
  | 'line_of_sight'
  | 'unknown_actor'
  | 'no_observers'
  | 'out_of_range'
  | 'blocked'
  | 'outside_cone'
  | 'indifferent'
  | 'undetectable'
  | 'below_threshold';

export interface DetectionResult {
  detected: boolean;
  observerId: string | null;
  severity: number;
  riskTag: string;
  reason: DetectionReason;
}

export interface DetectionDials {
  patrolFrequencyMultiplier: number;
  detectionSensitivityMultiplier: number;
}

export interface DetectionSnapshot {
  observers: Observer[];
  actors: Array<{ id: string; pose: ActorPose }>;
  dials: DetectionDials;
  elapsedSeconds: number;
}
