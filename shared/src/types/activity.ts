export type ActivityKind = 'physical' | 'screen' | 'passive';

export type MultitaskingLevel = 'full' | 'partial' | 'breaks' | 'none';

export type ActivityState = 'active' | 'running' | 'paused' | 'failed' | 'completed';

export interface ActivityPhase {
  name: string;
  durationSeconds: number;
  multitaskingAllowedInPhase: boolean;
  attentionInPhase: number;
}

export interface Activity {
  id: string;
  ownerId: string;
  kind: ActivityKind;
  riskTag: string;
  multitaskingLevel: MultitaskingLevel;
  requiredAttention: number;
  durationSeconds: number;
  state: ActivityState;
  startedAt: number;          // game seconds
  elapsedSeconds: number;
  performanceScore: number;
  wasDetected: boolean;
  concurrentWith: string[];
  phases: ActivityPhase[];
  currentPhaseIndex: number;
  phaseElapsedSeconds: number;
}

export interface CreateActivityOptions {
  ownerId?: string;
  multitaskingLevel?: MultitaskingLevel;
  requiredAttention?: number;
  phases?: ActivityPhase[];
}

export interface ActivityResult {
  activityId: string;
  ownerId: string | null;
  riskTag: string | null;
  performanceScore: number;
  elapsedSeconds: number;
  completed: boolean;
  wasDetected: boolean;
}
