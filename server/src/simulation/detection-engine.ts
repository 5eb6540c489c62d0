import type {
  ActorPose, DetectionDials, DetectionReason, DetectionResult, DetectionSnapshot,
  Observer, ObserverData, RiskProfile, Vec3,
} from '@hustle/shared';
import {
  SIM_CONFIG, getRiskProfile,
  DETECTION_MIN_DISTANCE, PATROL_JITTER_FRACTION, MIN_DIAL_MULTIPLIER, DEFAULT_FACING,
  SEVERITY_BASE, SEVERITY_ILLEGAL_BONUS, SEVERITY_LAW_ENFORCEMENT_BONUS, SEVERITY_AUTHORITY_BONUS,
} from '@hustle/shared';
import type { SignalBus } from './signals.js';
import { type LineOfSight, OPEN_SIGHTLINES } from './occlusion.js';
import { type RandomSource, MATH_RANDOM, randomRange } from './random.js';
import { angleBetweenDeg, clamp, clamp01, distance, isFiniteVec, normalize, sub } from './vec3.js';

/** What the activity engine asks of detection */
export interface DetectionQuery {
  checkDetection(actorId: string, riskTag: string): DetectionResult;
  getRiskProfile(riskTag: string): RiskProfile;
}

/** The dials the heat engine turns */
export interface DetectionDialControl {
  setPatrolFrequency(multiplier: number): void;
  setDetectionSensitivity(multiplier: number): void;
}

export interface DetectionEngineOptions {
  signals: SignalBus;
  lineOfSight?: LineOfSight;
  random?: RandomSource;
  /** Shared by reference; only this engine's setters write to it */
  dials?: DetectionDials;
}

// Pipeline order; when nobody sees the actor, the furthest stage reached is reported
const REJECTION_ORDER: DetectionReason[] = [
  'out_of_range', 'blocked', 'outside_cone', 'indifferent', 'undetectable', 'below_threshold',
];

export function createDials(): DetectionDials {
  return { patrolFrequencyMultiplier: 1, detectionSensitivityMultiplier: 1 };
}

export class DetectionEngine implements DetectionQuery, DetectionDialControl {
  private observers = new Map<string, Observer>();
  private actors = new Map<string, ActorPose>();
  private riskOverrides = new Map<string, RiskProfile>();
  private signals: SignalBus;
  private lineOfSight: LineOfSight;
  private random: RandomSource;
  readonly dials: DetectionDials;
  private elapsedSeconds = 0;

  constructor(opts: DetectionEngineOptions) {
    this.signals = opts.signals;
    this.lineOfSight = opts.lineOfSight ?? OPEN_SIGHTLINES;
    this.random = opts.random ?? MATH_RANDOM;
    this.dials = opts.dials ?? createDials();
  }

  // === Registry ===

  /** Register or overwrite an observer. Returns false when the data is unusable. */
  registerObserver(id: string, data: ObserverData): boolean {
    if (!id) {
      console.warn('[Detection] registerObserver: empty observer id');
      return false;
    }
    if (!(data.visionRange > 0) || !Number.isFinite(data.visionRange)) {
      console.warn(`[Detection] registerObserver: ${id} has invalid visionRange ${data.visionRange}`);
      return false;
    }
    if (!isFiniteVec(data.position)) {
      console.warn(`[Detection] registerObserver: ${id} has a non-finite position`);
      return false;
    }

    const previous = this.observers.get(id);
    this.observers.set(id, {
      id,
      role: data.role,
      position: { ...data.position },
      facing: normalize(data.facing) ?? { ...DEFAULT_FACING },
      visionRange: data.visionRange,
      visionConeDegrees: clamp(Number.isFinite(data.visionConeDegrees) ? data.visionConeDegrees : 360, Number.EPSILON, 360),
      audioSensitivity: clamp01(Number.isFinite(data.audioSensitivity) ? data.audioSensitivity : 0),
      caresAboutLegality: data.caresAboutLegality,
      caresAboutJobPerformance: data.caresAboutJobPerformance,
      currentLocation: data.currentLocation,
      // Re-registration keeps an existing patrol route
      patrolWaypoints: previous ? previous.patrolWaypoints : [],
      patrolIntervalSeconds: previous ? previous.patrolIntervalSeconds : 0,
      currentWaypointIndex: previous ? previous.currentWaypointIndex : 0,
      nextPatrolTime: previous ? previous.nextPatrolTime : 0,
    });
    return true;
  }

  unregisterObserver(id: string): boolean {
    if (!this.observers.delete(id)) {
      console.warn(`[Detection] unregisterObserver: observer ${id} not found`);
      return false;
    }
    return true;
  }

  updateObserverPose(id: string, position: Vec3, facing: Vec3): boolean {
    const observer = this.observers.get(id);
    if (!observer) {
      console.warn(`[Detection] updateObserverPose: observer ${id} not found`);
      return false;
    }
    if (!isFiniteVec(position)) {
      console.warn(`[Detection] updateObserverPose: ${id} given a non-finite position`);
      return false;
    }
    observer.position = { ...position };
    const unit = normalize(facing);
    if (unit) observer.facing = unit;
    return true;
  }

  setObserverLocation(id: string, locationId: string): boolean {
    const observer = this.observers.get(id);
    if (!observer) {
      console.warn(`[Detection] setObserverLocation: observer ${id} not found`);
      return false;
    }
    observer.currentLocation = locationId;
    return true;
  }

  setPatrolRoute(id: string, waypoints: Vec3[], intervalSeconds: number): boolean {
    const observer = this.observers.get(id);
    if (!observer) {
      console.warn(`[Detection] setPatrolRoute: observer ${id} not found`);
      return false;
    }
    if (waypoints.length > 0 && !(intervalSeconds > 0)) {
      console.warn(`[Detection] setPatrolRoute: ${id} needs a positive interval`);
      return false;
    }
    observer.patrolWaypoints = waypoints.filter(isFiniteVec).map(w => ({ ...w }));
    observer.currentWaypointIndex = 0;
    observer.patrolIntervalSeconds = waypoints.length > 0 ? intervalSeconds : 0;
    observer.nextPatrolTime = this.elapsedSeconds + observer.patrolIntervalSeconds;
    return true;
  }

  getObserver(id: string): Observer | undefined {
    const observer = this.observers.get(id);
    return observer ? cloneObserver(observer) : undefined;
  }

  listObservers(): Observer[] {
    return Array.from(this.observers.values(), cloneObserver);
  }

  // === Actors ===

  setActorPose(actorId: string, position: Vec3, locationId: string): boolean {
    if (!actorId || !isFiniteVec(position)) {
      console.warn(`[Detection] setActorPose: rejected pose for "${actorId}"`);
      return false;
    }
    this.actors.set(actorId, { position: { ...position }, locationId });
    return true;
  }

  getActorPose(actorId: string): ActorPose | undefined {
    const pose = this.actors.get(actorId);
    return pose ? { position: { ...pose.position }, locationId: pose.locationId } : undefined;
  }

  // === Risk profiles ===

  setRiskProfile(riskTag: string, profile: RiskProfile): void {
    this.riskOverrides.set(riskTag, { ...profile, visualProfile: Math.max(0, profile.visualProfile) });
  }

  getRiskProfile(riskTag: string): RiskProfile {
    return this.riskOverrides.get(riskTag) ?? getRiskProfile(riskTag);
  }

  // === Queries ===

  checkDetection(actorId: string, riskTag: string): DetectionResult {
    const pose = this.actors.get(actorId);
    if (!pose) {
      console.warn(`[Detection] checkDetection: no pose for actor ${actorId}`);
      return miss(riskTag, 'unknown_actor');
    }

    const profile = this.getRiskProfile(riskTag);
    let furthest = -1;

    for (const observer of this.observers.values()) {
      if (observer.currentLocation !== pose.locationId) continue;

      const rejection = this.evaluate(observer, pose.position, profile);
      if (rejection === null) {
        const result: DetectionResult = {
          detected: true,
          observerId: observer.id,
          severity: this.calculateSeverity(profile, observer),
          riskTag,
          reason: 'line_of_sight',
        };
        this.signals.emit({ type: 'player_detected', actorId, result });
        return result;
      }
      furthest = Math.max(furthest, REJECTION_ORDER.indexOf(rejection));
    }

    return miss(riskTag, furthest >= 0 ? REJECTION_ORDER[furthest] : 'no_observers');
  }

  /**
   * Continuous 0-1 risk for feedback UI. Skips the cone and line-of-sight
   * tests, so it over-estimates rather than under-estimates.
   */
  getDetectionRisk(actorId: string, riskTag: string, locationId: string): number {
    const pose = this.actors.get(actorId);
    if (!pose) {
      console.warn(`[Detection] getDetectionRisk: no pose for actor ${actorId}`);
      return 0;
    }

    const profile = this.getRiskProfile(riskTag);
    let maxRisk = 0;

    for (const observer of this.observers.values()) {
      if (observer.currentLocation !== locationId) continue;

      const dist = distance(observer.position, pose.position);
      if (dist > observer.visionRange) continue;
      if (!cares(observer, profile)) continue;

      const proximity = 1 - dist / observer.visionRange;
      const risk = proximity * profile.visualProfile * this.dials.detectionSensitivityMultiplier;
      if (risk > maxRisk) maxRisk = risk;
    }

    const clamped = clamp01(maxRisk);
    this.signals.emit({ type: 'detection_risk', actorId, risk: clamped });
    return clamped;
  }

  // === Global dials ===
  // Multiplicative: two calls with 1.5 leave the dial at 2.25

  setPatrolFrequency(multiplier: number): void {
    if (!(multiplier > 0) || !Number.isFinite(multiplier)) {
      console.warn(`[Detection] setPatrolFrequency: ignoring multiplier ${multiplier}`);
      return;
    }
    this.dials.patrolFrequencyMultiplier = Math.max(MIN_DIAL_MULTIPLIER, this.dials.patrolFrequencyMultiplier * multiplier);
  }

  setDetectionSensitivity(multiplier: number): void {
    if (!(multiplier > 0) || !Number.isFinite(multiplier)) {
      console.warn(`[Detection] setDetectionSensitivity: ignoring multiplier ${multiplier}`);
      return;
    }
    this.dials.detectionSensitivityMultiplier = Math.max(MIN_DIAL_MULTIPLIER, this.dials.detectionSensitivityMultiplier * multiplier);
  }

  getDials(): DetectionDials {
    return { ...this.dials };
  }

  // === Patrols ===

  tick(deltaSeconds: number): void {
    if (!(deltaSeconds > 0)) return;
    this.elapsedSeconds += deltaSeconds;

    for (const observer of this.observers.values()) {
      const route = observer.patrolWaypoints;
      if (route.length === 0) continue;
      if (this.elapsedSeconds < observer.nextPatrolTime) continue;

      observer.currentWaypointIndex = (observer.currentWaypointIndex + 1) % route.length;
      const next = route[observer.currentWaypointIndex];
      const heading = normalize(sub(next, observer.position));
      observer.position = { ...next };
      if (heading) observer.facing = heading;

      // Jitter is redrawn every step from the current dial value
      const interval = observer.patrolIntervalSeconds / this.dials.patrolFrequencyMultiplier;
      const variance = interval * PATROL_JITTER_FRACTION;
      observer.nextPatrolTime = this.elapsedSeconds + interval + randomRange(this.random, -variance, variance);
    }
  }

  // === Snapshots ===

  snapshot(): DetectionSnapshot {
    return {
      observers: this.listObservers(),
      actors: Array.from(this.actors.entries(), ([id, pose]) => ({
        id, pose: { position: { ...pose.position }, locationId: pose.locationId },
      })),
      dials: this.getDials(),
      elapsedSeconds: this.elapsedSeconds,
    };
  }

  restore(snapshot: DetectionSnapshot): void {
    this.observers.clear();
    for (const observer of snapshot.observers) {
      this.observers.set(observer.id, cloneObserver(observer));
    }
    this.actors.clear();
    for (const { id, pose } of snapshot.actors) {
      this.actors.set(id, { position: { ...pose.position }, locationId: pose.locationId });
    }
    this.dials.patrolFrequencyMultiplier = Math.max(MIN_DIAL_MULTIPLIER, snapshot.dials.patrolFrequencyMultiplier);
    this.dials.detectionSensitivityMultiplier = Math.max(MIN_DIAL_MULTIPLIER, snapshot.dials.detectionSensitivityMultiplier);
    this.elapsedSeconds = Math.max(0, snapshot.elapsedSeconds);
  }

  // === Internals ===

  /** null = detected; otherwise the first stage that rejected */
  private evaluate(observer: Observer, actorPos: Vec3, profile: RiskProfile): DetectionReason | null {
    const dist = distance(observer.position, actorPos);
    if (dist > observer.visionRange) return 'out_of_range';

    if (this.lineOfSight.raycastBlocked(observer.position, actorPos)) return 'blocked';

    const toActor = sub(actorPos, observer.position);
    if (angleBetweenDeg(observer.facing, toActor) > observer.visionConeDegrees / 2) return 'outside_cone';

    if (!cares(observer, profile)) return 'indifferent';

    if (profile.visualProfile <= 0) return 'undetectable';

    const awareness = observer.visionRange / Math.max(dist, DETECTION_MIN_DISTANCE);
    if (awareness * this.dials.detectionSensitivityMultiplier < profile.visualProfile) return 'below_threshold';

    return null;
  }

  private calculateSeverity(profile: RiskProfile, observer: Observer): number {
    let severity = SEVERITY_BASE;
    if (!profile.isLegal) {
      severity += SEVERITY_ILLEGAL_BONUS;
      if (SIM_CONFIG.lawEnforcementRoles.includes(observer.role)) {
        severity += SEVERITY_LAW_ENFORCEMENT_BONUS;
      }
    }
    if (SIM_CONFIG.authorityRoles.includes(observer.role) && observer.caresAboutJobPerformance) {
      severity += SEVERITY_AUTHORITY_BONUS;
    }
    return clamp01(severity);
  }
}

/** Legal activity only matters to observers watching performance; illegal only to those watching the law */
function cares(observer: Observer, profile: RiskProfile): boolean {
  return profile.isLegal ? observer.caresAboutJobPerformance : observer.caresAboutLegality;
}

function miss(riskTag: string, reason: DetectionReason): DetectionResult {
  return { detected: false, observerId: null, severity: 0, riskTag, reason };
}

function cloneObserver(o: Observer): Observer {
  return {
    ...o,
    position: { ...o.position },
    facing: { ...o.facing },
    patrolWaypoints: o.patrolWaypoints.map(w => ({ ...w })),
  };
}
