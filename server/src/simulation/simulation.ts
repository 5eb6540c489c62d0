import type { Activity, DetectionSnapshot, HeatSnapshot, StatusUpdate } from '@hustle/shared';
import { SIM_CONFIG, HEAT_PER_DETECTION, GAME_HOUR_SECONDS } from '@hustle/shared';
import { SignalBus } from './signals.js';
import { GameClock } from './game-clock.js';
import { DetectionEngine, createDials } from './detection-engine.js';
import { ActivityEngine } from './activity-engine.js';
import { HeatEngine, type EvidenceSource } from './heat-engine.js';
import type { LineOfSight } from './occlusion.js';
import type { RandomSource } from './random.js';
import { Ledger, type EconomyPort } from '../economy/ledger.js';

export interface SimulationOptions {
  actorId?: string;
  /** Heat per caught illegal activity at severity 1 */
  heatPerDetection?: number;
  lineOfSight?: LineOfSight;
  economy?: EconomyPort;
  evidence?: EvidenceSource;
  random?: RandomSource;
  startSeconds?: number;
}

export interface SimulationSnapshot {
  gameSeconds: number;
  detection: DetectionSnapshot;
  activities: Activity[];
  heat: HeatSnapshot;
}

/**
 * The three engines wired in dependency order around one signal bus and one
 * clock. `step` is the only thing that moves time.
 */
export class Simulation {
  readonly actorId: string;
  readonly signals = new SignalBus();
  readonly clock: GameClock;
  readonly detection: DetectionEngine;
  readonly activities: ActivityEngine;
  readonly heat: HeatEngine;
  readonly economy: EconomyPort;
  private heatPerDetection: number;

  constructor(opts: SimulationOptions = {}) {
    this.actorId = opts.actorId ?? SIM_CONFIG.defaultActorId;
    this.heatPerDetection = opts.heatPerDetection ?? HEAT_PER_DETECTION;
    this.clock = new GameClock(opts.startSeconds ?? 0);
    this.economy = opts.economy ?? new Ledger();

    this.detection = new DetectionEngine({
      signals: this.signals,
      lineOfSight: opts.lineOfSight,
      random: opts.random,
      dials: createDials(),
    });
    this.activities = new ActivityEngine({
      detection: this.detection,
      signals: this.signals,
      clock: this.clock,
      defaultOwnerId: this.actorId,
    });
    this.heat = new HeatEngine({
      actorId: this.actorId,
      detection: this.detection,
      economy: this.economy,
      signals: this.signals,
      clock: this.clock,
      evidence: opts.evidence,
    });

    // Getting caught doing something illegal is the main heat source
    this.signals.on('activity_caught', (signal) => {
      if (signal.isLegal || signal.ownerId !== this.actorId) return;
      const amount = this.heatPerDetection * signal.detection.severity;
      if (amount > 0) this.heat.addHeat(amount, signal.riskTag);
    });

    if (this.economy instanceof Ledger) {
      this.economy.onIncome((actorId, amount, source) => {
        if (actorId === this.actorId) this.heat.onSuspiciousTransaction(amount, source);
      });
    }
  }

  /**
   * Advance by `deltaGameSeconds`. Activity evaluation (with its detection
   * queries) is flushed before heat ticks, so a detection this step adds heat
   * this step.
   */
  step(deltaGameSeconds: number): void {
    if (!(deltaGameSeconds > 0) || !Number.isFinite(deltaGameSeconds)) return;

    this.clock.advanceSeconds(deltaGameSeconds);
    this.detection.tick(deltaGameSeconds);
    this.activities.tick(deltaGameSeconds);
    this.signals.flush();

    this.heat.tick(deltaGameSeconds / GAME_HOUR_SECONDS);
    this.signals.flush();
  }

  /** Run `hours` of game time in fixed steps */
  run(hours: number, stepSeconds = 60): void {
    let remaining = hours * GAME_HOUR_SECONDS;
    while (remaining > 0) {
      const dt = Math.min(stepSeconds, remaining);
      this.step(dt);
      remaining -= dt;
    }
  }

  statusUpdate(): StatusUpdate {
    return {
      game_time: this.clock.now(),
      actor_id: this.actorId,
      heat: this.heat.getLevel(),
      heat_sources: this.heat.getSources(),
      investigations: this.heat.getInvestigations(),
      dials: this.detection.getDials(),
      activities: this.activities.getActiveActivities(this.actorId),
      observers: this.detection.listObservers(),
    };
  }

  snapshot(): SimulationSnapshot {
    return {
      gameSeconds: this.clock.now(),
      detection: this.detection.snapshot(),
      activities: this.activities.snapshot(),
      heat: this.heat.snapshot(),
    };
  }

  restore(snapshot: SimulationSnapshot): void {
    this.clock.set(snapshot.gameSeconds);
    this.detection.restore(snapshot.detection);
    this.activities.restore(snapshot.activities);
    this.heat.restore(snapshot.heat);
    this.signals.clear();
  }
}
