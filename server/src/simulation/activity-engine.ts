import { v4 as uuid } from 'uuid';
import type {
  Activity, ActivityKind, ActivityPhase, ActivityResult, CreateActivityOptions, MultitaskingLevel,
} from '@hustle/shared';
import {
  SIM_CONFIG,
  PERFORMANCE_START, PERFORMANCE_DEFAULT_SAMPLE, PERFORMANCE_SAMPLE_WEIGHT,
  DETECTION_PERFORMANCE_PENALTY, MIN_ACTIVITY_DURATION_SECONDS, MAX_COMBINED_ATTENTION,
} from '@hustle/shared';
import type { DetectionQuery } from './detection-engine.js';
import type { SignalBus } from './signals.js';
import type { TimeProvider } from './game-clock.js';
import { clamp, clamp01 } from './vec3.js';

export interface ActivityEngineOptions {
  detection: DetectionQuery;
  signals: SignalBus;
  clock: TimeProvider;
  defaultOwnerId?: string;
  idFactory?: () => string;
}

const LIVE_STATES = new Set<Activity['state']>(['active', 'running']);

/**
 * Pairwise multitasking rule. Two bodies-in-motion or two screens never mix,
 * attention must fit in one head, and `none` refuses all company.
 */
export function areCompatible(
  a: Pick<Activity, 'kind' | 'requiredAttention' | 'multitaskingLevel'>,
  b: Pick<Activity, 'kind' | 'requiredAttention' | 'multitaskingLevel'>,
): boolean {
  if (a.kind === 'physical' && b.kind === 'physical') return false;
  if (a.kind === 'screen' && b.kind === 'screen') return false;
  if (a.requiredAttention + b.requiredAttention > MAX_COMBINED_ATTENTION) return false;
  if (a.multitaskingLevel === 'none' || b.multitaskingLevel === 'none') return false;
  return true;
}

/** Attention a tag demands when the catalog does not say */
export function defaultAttentionFor(riskTag: string): number {
  if (!riskTag) return 0.4;
  if (riskTag.includes('stream')) return 0.8;
  if (riskTag.includes('work')) return 0.6;
  return 0.5;
}

export class ActivityEngine {
  // Insertion order = creation order; tick and tie-breaks rely on it
  private activities = new Map<string, Activity>();
  private performanceSamples = new Map<string, number>();
  private detection: DetectionQuery;
  private signals: SignalBus;
  private clock: TimeProvider;
  private defaultOwnerId: string;
  private nextId: () => string;

  constructor(opts: ActivityEngineOptions) {
    this.detection = opts.detection;
    this.signals = opts.signals;
    this.clock = opts.clock;
    this.defaultOwnerId = opts.defaultOwnerId ?? SIM_CONFIG.defaultActorId;
    this.nextId = opts.idFactory ?? (() => uuid());
  }

  /**
   * Start an activity. The new one always runs; any live activity of the same
   * owner it cannot be combined with is paused instead.
   */
  create(kind: ActivityKind, riskTag: string, durationSeconds: number, options: CreateActivityOptions = {}): string {
    const profile = this.detection.getRiskProfile(riskTag);
    const id = this.nextId();
    const ownerId = options.ownerId ?? this.defaultOwnerId;

    let duration = durationSeconds;
    if (!(duration >= MIN_ACTIVITY_DURATION_SECONDS) || !Number.isFinite(duration)) {
      console.warn(`[Activity] create: duration ${durationSeconds}s clamped to ${MIN_ACTIVITY_DURATION_SECONDS}s`);
      duration = MIN_ACTIVITY_DURATION_SECONDS;
    }

    const attention = options.requiredAttention ?? profile.requiredAttention ?? defaultAttentionFor(riskTag);

    const activity: Activity = {
      id,
      ownerId,
      kind,
      riskTag,
      multitaskingLevel: options.multitaskingLevel ?? 'partial',
      requiredAttention: clamp01(attention),
      durationSeconds: duration,
      state: 'active',
      startedAt: this.clock.now(),
      elapsedSeconds: 0,
      performanceScore: PERFORMANCE_START,
      wasDetected: false,
      concurrentWith: [],
      phases: (options.phases ?? []).map(sanitizePhase),
      currentPhaseIndex: 0,
      phaseElapsedSeconds: 0,
    };

    this.resolveConflicts(activity);
    this.activities.set(id, activity);
    this.signals.emit({ type: 'activity_started', activityId: id, ownerId, kind, riskTag });
    return id;
  }

  pause(id: string): boolean {
    const activity = this.activities.get(id);
    if (!activity) {
      console.warn(`[Activity] pause: activity ${id} not found`);
      return false;
    }
    if (!LIVE_STATES.has(activity.state)) return false;

    activity.state = 'paused';
    this.signals.emit({ type: 'activity_paused', activityId: id });
    return true;
  }

  /** Resuming is a fresh multitasking decision: the resumed activity wins conflicts. */
  resume(id: string): boolean {
    const activity = this.activities.get(id);
    if (!activity) {
      console.warn(`[Activity] resume: activity ${id} not found`);
      return false;
    }
    if (activity.state !== 'paused') return false;

    this.resolveConflicts(activity);
    activity.state = 'running';
    this.signals.emit({ type: 'activity_resumed', activityId: id });
    return true;
  }

  /** Finish an activity and hand back its result exactly once. */
  end(id: string): ActivityResult {
    return this.finish(id, 'completed');
  }

  fail(id: string): ActivityResult {
    return this.finish(id, 'failed');
  }

  tick(deltaSeconds: number): void {
    if (!(deltaSeconds > 0)) return;

    for (const activity of [...this.activities.values()]) {
      // An earlier iteration may have ended this one
      if (!this.activities.has(activity.id)) continue;
      if (!LIVE_STATES.has(activity.state)) continue;

      activity.state = 'running';
      activity.elapsedSeconds += deltaSeconds;
      if (activity.elapsedSeconds >= activity.durationSeconds) {
        this.end(activity.id);
        continue;
      }

      const sample = this.performanceSamples.get(activity.id) ?? PERFORMANCE_DEFAULT_SAMPLE;
      activity.performanceScore =
        activity.performanceScore * (1 - PERFORMANCE_SAMPLE_WEIGHT) + sample * PERFORMANCE_SAMPLE_WEIGHT;

      if (!activity.wasDetected && this.isRiskBearing(activity.riskTag)) {
        const detection = this.detection.checkDetection(activity.ownerId, activity.riskTag);
        if (detection.detected) {
          activity.wasDetected = true;
          activity.performanceScore = Math.max(0, activity.performanceScore - DETECTION_PERFORMANCE_PENALTY);
          this.signals.emit({
            type: 'activity_caught',
            activityId: activity.id,
            ownerId: activity.ownerId,
            riskTag: activity.riskTag,
            isLegal: this.detection.getRiskProfile(activity.riskTag).isLegal,
            detection,
          });
        }
      }

      if (activity.phases.length > 0) {
        this.advancePhases(activity, deltaSeconds);
      }
    }
  }

  // === Mutators for minigames and tests ===

  /** Latest minigame performance (0-100) blended in on each tick */
  setPerformanceSample(id: string, sample: number): boolean {
    if (!this.activities.has(id)) {
      console.warn(`[Activity] setPerformanceSample: activity ${id} not found`);
      return false;
    }
    if (!Number.isFinite(sample)) return false;
    this.performanceSamples.set(id, clamp(sample, 0, 100));
    return true;
  }

  setPhases(id: string, phases: ActivityPhase[]): boolean {
    const activity = this.activities.get(id);
    if (!activity) {
      console.warn(`[Activity] setPhases: activity ${id} not found`);
      return false;
    }
    activity.phases = phases.map(sanitizePhase);
    activity.currentPhaseIndex = 0;
    activity.phaseElapsedSeconds = 0;
    return true;
  }

  // === Queries ===

  getActivity(id: string): Activity | undefined {
    const activity = this.activities.get(id);
    return activity ? cloneActivity(activity) : undefined;
  }

  getActiveActivities(ownerId: string = this.defaultOwnerId): Activity[] {
    const live: Activity[] = [];
    for (const activity of this.activities.values()) {
      if (activity.ownerId === ownerId && LIVE_STATES.has(activity.state)) live.push(cloneActivity(activity));
    }
    return live;
  }

  listActivities(): Activity[] {
    return Array.from(this.activities.values(), cloneActivity);
  }

  getPerformance(id: string): number {
    return this.activities.get(id)?.performanceScore ?? 0;
  }

  canMultitask(idA: string, idB: string): boolean {
    const a = this.activities.get(idA);
    const b = this.activities.get(idB);
    if (!a || !b) return false;
    return areCompatible(a, b);
  }

  isRiskBearing(riskTag: string): boolean {
    return this.detection.getRiskProfile(riskTag).riskBearing ?? riskTag.includes('work');
  }

  // === Snapshots ===

  snapshot(): Activity[] {
    return this.listActivities();
  }

  restore(activities: Activity[]): void {
    this.activities.clear();
    this.performanceSamples.clear();
    for (const activity of activities) {
      if (activity.state === 'completed' || activity.state === 'failed') continue;
      this.activities.set(activity.id, cloneActivity(activity));
    }
  }

  // === Internals ===

  private resolveConflicts(incoming: Activity): void {
    for (const existing of this.activities.values()) {
      if (existing.id === incoming.id) continue;
      if (existing.ownerId !== incoming.ownerId) continue;
      if (!LIVE_STATES.has(existing.state)) continue;

      const compatible = areCompatible(incoming, existing);
      this.signals.emit({ type: 'multitask_attempt', activityId: incoming.id, otherId: existing.id, compatible });

      if (!compatible) {
        this.pause(existing.id);
        unlink(incoming, existing);
      } else {
        link(incoming, existing);
      }
    }
  }

  private finish(id: string, outcome: 'completed' | 'failed'): ActivityResult {
    const activity = this.activities.get(id);
    if (!activity) {
      console.warn(`[Activity] end: activity ${id} not found`);
      return emptyResult(id);
    }

    activity.state = outcome;
    this.activities.delete(id);
    this.performanceSamples.delete(id);
    for (const other of this.activities.values()) unlink(activity, other);

    const result: ActivityResult = {
      activityId: id,
      ownerId: activity.ownerId,
      riskTag: activity.riskTag,
      performanceScore: activity.performanceScore,
      elapsedSeconds: activity.elapsedSeconds,
      completed: outcome === 'completed',
      wasDetected: activity.wasDetected,
    };
    this.signals.emit({ type: 'activity_ended', result });
    return result;
  }

  private advancePhases(activity: Activity, deltaSeconds: number): void {
    activity.phaseElapsedSeconds += deltaSeconds;
    // One step per phase boundary crossed; a long tick can cross several
    let guard = activity.phases.length;
    while (guard-- > 0) {
      const current = activity.phases[activity.currentPhaseIndex];
      if (activity.phaseElapsedSeconds < current.durationSeconds) break;

      activity.phaseElapsedSeconds -= current.durationSeconds;
      activity.currentPhaseIndex = (activity.currentPhaseIndex + 1) % activity.phases.length;
      const next = activity.phases[activity.currentPhaseIndex];
      activity.multitaskingLevel = phaseMultitasking(next);
      activity.requiredAttention = next.attentionInPhase;
      this.signals.emit({
        type: 'activity_phase_changed',
        activityId: activity.id,
        phaseIndex: activity.currentPhaseIndex,
        phase: { ...next },
      });
    }
  }
}

function phaseMultitasking(phase: ActivityPhase): MultitaskingLevel {
  return phase.multitaskingAllowedInPhase ? 'breaks' : 'none';
}

function sanitizePhase(phase: ActivityPhase): ActivityPhase {
  return {
    name: phase.name,
    durationSeconds: Math.max(MIN_ACTIVITY_DURATION_SECONDS, Number.isFinite(phase.durationSeconds) ? phase.durationSeconds : 0),
    multitaskingAllowedInPhase: phase.multitaskingAllowedInPhase,
    attentionInPhase: clamp01(Number.isFinite(phase.attentionInPhase) ? phase.attentionInPhase : 0),
  };
}

function link(a: Activity, b: Activity): void {
  if (!a.concurrentWith.includes(b.id)) a.concurrentWith.push(b.id);
  if (!b.concurrentWith.includes(a.id)) b.concurrentWith.push(a.id);
}

function unlink(a: Activity, b: Activity): void {
  a.concurrentWith = a.concurrentWith.filter(id => id !== b.id);
  b.concurrentWith = b.concurrentWith.filter(id => id !== a.id);
}

function emptyResult(id: string): ActivityResult {
  return {
    activityId: id,
    ownerId: null,
    riskTag: null,
    performanceScore: 0,
    elapsedSeconds: 0,
    completed: false,
    wasDetected: false,
  };
}

function cloneActivity(a: Activity): Activity {
  return {
    ...a,
    concurrentWith: [...a.concurrentWith],
    phases: a.phases.map(p => ({ ...p })),
  };
}
