import type { ActivityKind, ActivityPhase, ActivityResult, Activity } from './activity.js';
import type { DetectionResult, DetectionDials, Observer } from './perception.js';
import type { InvestigationType, InvestigationState } from './heat.js';

// === Simulation signals (engine -> subscribers) ===

export type SimSignal =
  | { type: 'activity_started'; activityId: string; ownerId: string; kind: ActivityKind; riskTag: string }
  | { type: 'activity_paused'; activityId: string }
  | { type: 'activity_resumed'; activityId: string }
  | { type: 'activity_ended'; result: ActivityResult }
  | { type: 'activity_phase_changed'; activityId: string; phaseIndex: number; phase: ActivityPhase }
  | { type: 'multitask_attempt'; activityId: string; otherId: string; compatible: boolean }
  | { type: 'activity_caught'; activityId: string; ownerId: string; riskTag: string; isLegal: boolean; detection: DetectionResult }
  | { type: 'player_detected'; actorId: string; result: DetectionResult }
  | { type: 'detection_risk'; actorId: string; risk: number }
  | { type: 'heat_increased'; actorId: string; amount: number; cause: string; level: number }
  | { type: 'heat_decreased'; actorId: string; amount: number; level: number }
  | { type: 'heat_cleared'; actorId: string }
  | { type: 'heat_threshold_crossed'; actorId: string; threshold: number; level: number }
  | { type: 'investigation_triggered'; actorId: string; investigation: InvestigationType }
  | { type: 'audit_resolved'; actorId: string; outcome: 'cleared' | 'fined'; fine: number }
  | { type: 'warrant_resolved'; actorId: string };

export type SimSignalType = SimSignal['type'];

export type SignalOf<T extends SimSignalType> = Extract<SimSignal, { type: T }>;

// === Server -> UI messages ===

export interface StatusUpdate {
  game_time: number;        // game seconds since the simulation started
  actor_id: string;
  heat: number;
  heat_sources: Record<string, number>;
  investigations: InvestigationState;
  dials: DetectionDials;
  activities: Activity[];
  observers: Observer[];
}

export type ServerMessage =
  | { type: 'welcome'; status: StatusUpdate }
  | { type: 'status'; data: StatusUpdate }
  | { type: 'signal'; game_time: number; signal: SimSignal }
  | { type: 'error'; code: string; message: string };

// === UI -> server messages ===

export type ClientMessage =
  | { type: 'subscribe'; signals: SimSignalType[] }   // empty list = everything
  | { type: 'status' };
