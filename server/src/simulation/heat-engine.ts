import type { HeatModifier, HeatSnapshot, IncomeSource, InvestigationState, InvestigationType } from '@hustle/shared';
import {
  SIM_CONFIG, renderMessage,
  HEAT_MAX, HEAT_THRESHOLDS, HEAT_BASE_DECAY_PER_HOUR, HEAT_FRESH_DAYS, HEAT_SETTLED_DAYS, HEAT_STALE_DAYS,
  GAME_HOUR_SECONDS, GAME_DAY_SECONDS,
  PATROL_BOOST_THRESHOLD_30, SURVEILLANCE_PATROL_MULTIPLIER, SURVEILLANCE_SENSITIVITY_MULTIPLIER,
  WARRANT_PATROL_MULTIPLIER, RAID_HEAT_FACTOR,
  AUDIT_LEGITIMACY_TRIGGER, AUDIT_CLEAN_LEGITIMACY, AUDIT_FREEZE_FRACTION, AUDIT_FINE_FRACTION, AUDIT_DURATION_DAYS,
  LARGE_DEPOSIT_THRESHOLD, LARGE_DEPOSIT_HEAT_PER_10K, SUSPICIOUS_INCOME_HEAT,
  FLASHY_VANITY_THRESHOLD, FLASHY_HEAT_AT_MAX_VANITY,
} from '@hustle/shared';
import type { DetectionDialControl } from './detection-engine.js';
import type { EconomyPort } from '../economy/ledger.js';
import type { SignalBus } from './signals.js';
import type { TimeProvider } from './game-clock.js';
import { clamp } from './vec3.js';

/** Whether a raid would turn anything up */
export interface EvidenceSource {
  hasEvidence(actorId: string): boolean;
}

export const NO_EVIDENCE: EvidenceSource = { hasEvidence: () => false };

export interface HeatEngineOptions {
  actorId: string;
  detection: DetectionDialControl;
  economy: EconomyPort;
  signals: SignalBus;
  clock: TimeProvider;
  evidence?: EvidenceSource;
}

type Threshold = (typeof HEAT_THRESHOLDS)[number];

function idleInvestigations(): InvestigationState {
  return {
    surveillanceActive: false,
    warrantActive: false,
    audit: { active: false, frozenAmount: 0, resolvesAt: null },
  };
}

/** Decay speed by how long ago heat last went up */
export function decayMultiplier(daysSinceIncrease: number): number {
  if (daysSinceIncrease < HEAT_FRESH_DAYS) return 0.5;
  if (daysSinceIncrease > HEAT_STALE_DAYS) return 3;
  if (daysSinceIncrease > HEAT_SETTLED_DAYS) return 2;
  return 1;
}

/**
 * Suspicion accumulator for one actor. Every increase is attributed to a
 * cause; upward threshold crossings escalate into investigations that turn
 * the detection engine's dials.
 */
export class HeatEngine {
  readonly actorId: string;
  private level = 0;
  // Insertion order decides ties in reduceHeat
  private sources = new Map<string, number>();
  private lastIncreaseAt: number;
  private modifiers: HeatModifier[] = [];
  private investigations: InvestigationState = idleInvestigations();
  private detection: DetectionDialControl;
  private economy: EconomyPort;
  private signals: SignalBus;
  private clock: TimeProvider;
  private evidence: EvidenceSource;
  private evidenceOverride: boolean | null = null;
  private unreportedDecay = 0;

  constructor(opts: HeatEngineOptions) {
    this.actorId = opts.actorId;
    this.detection = opts.detection;
    this.economy = opts.economy;
    this.signals = opts.signals;
    this.clock = opts.clock;
    this.evidence = opts.evidence ?? NO_EVIDENCE;
    this.lastIncreaseAt = this.clock.now();
  }

  getLevel(): number {
    return this.level;
  }

  getSources(): Record<string, number> {
    return Object.fromEntries(this.sources);
  }

  getInvestigations(): InvestigationState {
    return {
      ...this.investigations,
      audit: { ...this.investigations.audit },
    };
  }

  getModifiers(): HeatModifier[] {
    return this.modifiers.map(m => ({ ...m }));
  }

  addHeat(amount: number, cause?: string): void {
    if (!(amount > 0) || !Number.isFinite(amount)) {
      console.warn(`[Heat] addHeat: ignoring amount ${amount}`);
      return;
    }
    const bucket = cause || SIM_CONFIG.heatSources.unknown;

    const oldLevel = this.level;
    this.level = clamp(this.level + amount, 0, HEAT_MAX);
    this.lastIncreaseAt = this.clock.now();
    this.sources.set(bucket, (this.sources.get(bucket) ?? 0) + amount);

    this.signals.emit({ type: 'heat_increased', actorId: this.actorId, amount, cause: bucket, level: this.level });
    this.checkThresholds(oldLevel, this.level);
  }

  /**
   * Lower heat and pay down one bucket: the named one when it exists,
   * otherwise the largest (first-inserted wins a tie).
   */
  reduceHeat(amount: number, cause?: string): void {
    if (!(amount > 0) || !Number.isFinite(amount)) {
      console.warn(`[Heat] reduceHeat: ignoring amount ${amount}`);
      return;
    }

    const oldLevel = this.level;
    this.level = clamp(this.level - amount, 0, HEAT_MAX);
    this.drainBucket(amount, cause);
    this.emitDecrease(oldLevel);
  }

  /** Advance modifiers, decay and any pending audit by a span of game time */
  tick(deltaGameHours: number): void {
    if (!(deltaGameHours > 0) || !Number.isFinite(deltaGameHours)) return;

    this.applyModifiers(deltaGameHours);
    this.decay(deltaGameHours);

    const audit = this.investigations.audit;
    if (audit.active && audit.resolvesAt !== null && this.clock.now() >= audit.resolvesAt) {
      this.resolveAudit();
    }
  }

  // === Economy hooks ===

  onSuspiciousTransaction(amount: number, source: IncomeSource | string): void {
    if (amount > LARGE_DEPOSIT_THRESHOLD) {
      this.addHeat((amount / 10_000) * LARGE_DEPOSIT_HEAT_PER_10K, SIM_CONFIG.heatSources.cashDeposit);
    }
    const flagged = SIM_CONFIG.flaggedIncomeSources.some(s => s.toLowerCase() === source.toLowerCase());
    if (flagged) {
      this.addHeat(SUSPICIOUS_INCOME_HEAT, SIM_CONFIG.heatSources.suspiciousIncome);
    }
  }

  onFlashyPurchase(vanity: number): void {
    if (vanity > FLASHY_VANITY_THRESHOLD) {
      this.addHeat((vanity / 100) * FLASHY_HEAT_AT_MAX_VANITY, SIM_CONFIG.heatSources.flashyPurchase);
    }
  }

  // === Modifiers ===

  /** Heat per game hour (negative cools); null duration = until removed */
  addModifier(source: string, amountPerHour: number, durationHours: number | null): boolean {
    if (!source || !Number.isFinite(amountPerHour) || amountPerHour === 0) {
      console.warn(`[Heat] addModifier: rejected ${source} at ${amountPerHour}/h`);
      return false;
    }
    if (durationHours !== null && !(durationHours > 0)) {
      console.warn(`[Heat] addModifier: ${source} needs a positive duration`);
      return false;
    }
    this.modifiers.push({
      source,
      amount: amountPerHour,
      expiresAt: durationHours === null ? null : this.clock.now() + durationHours * GAME_HOUR_SECONDS,
    });
    return true;
  }

  removeModifier(source: string): boolean {
    const before = this.modifiers.length;
    this.modifiers = this.modifiers.filter(m => m.source !== source);
    return this.modifiers.length < before;
  }

  // === Investigations ===

  triggerInvestigation(type: InvestigationType): void {
    switch (type) {
      case 'surveillance':
        this.investigations.surveillanceActive = true;
        this.detection.setPatrolFrequency(SURVEILLANCE_PATROL_MULTIPLIER);
        this.detection.setDetectionSensitivity(SURVEILLANCE_SENSITIVITY_MULTIPLIER);
        this.announce(type, {});
        break;

      case 'audit': {
        const audit = this.investigations.audit;
        if (audit.active) {
          console.warn(`[Heat] Audit already open on ${this.actorId}`);
          return;
        }
        const frozen = this.economy.getBalance(this.actorId) * AUDIT_FREEZE_FRACTION;
        const resolvesAt = this.clock.now() + AUDIT_DURATION_DAYS * GAME_DAY_SECONDS;
        this.economy.freezeFunds(this.actorId, frozen);
        this.investigations.audit = { active: true, frozenAmount: frozen, resolvesAt };
        this.announce(type, { amount: frozen.toFixed(2), day: Math.floor(resolvesAt / GAME_DAY_SECONDS) });
        break;
      }

      case 'raid': {
        const oldLevel = this.level;
        this.level *= RAID_HEAT_FACTOR;
        this.announce(type, { level: this.level.toFixed(1) });
        this.emitDecrease(oldLevel);
        break;
      }

      case 'arrest_warrant':
        this.investigations.warrantActive = true;
        this.detection.setPatrolFrequency(WARRANT_PATROL_MULTIPLIER);
        this.announce(type, {});
        break;
    }
  }

  /** External resolution of a warrant (served, dropped, paid off) */
  resolveWarrant(): boolean {
    if (!this.investigations.warrantActive) return false;
    this.investigations.warrantActive = false;
    this.detection.setPatrolFrequency(1 / WARRANT_PATROL_MULTIPLIER);
    this.signals.emit({ type: 'warrant_resolved', actorId: this.actorId });
    console.log(`[Heat] Warrant for ${this.actorId} resolved`);
    return true;
  }

  /** Close the open audit now, whatever its deadline */
  resolveAudit(): void {
    const audit = this.investigations.audit;
    if (!audit.active) return;

    let fine = 0;
    if (this.economy.getLegitimacyRatio(this.actorId) > AUDIT_CLEAN_LEGITIMACY) {
      this.economy.unfreezeFunds(this.actorId);
      console.log(`[Heat] ${renderMessage(SIM_CONFIG.messages.auditCleared, { actor: this.actorId })}`);
    } else {
      fine = this.economy.getBalance(this.actorId) * AUDIT_FINE_FRACTION;
      this.economy.applyFine(this.actorId, fine, 'Tax evasion penalty');
      this.economy.unfreezeFunds(this.actorId);
      console.log(`[Heat] ${renderMessage(SIM_CONFIG.messages.auditFined, { actor: this.actorId, fine: fine.toFixed(2) })}`);
    }

    this.investigations.audit = { active: false, frozenAmount: 0, resolvesAt: null };
    this.signals.emit({
      type: 'audit_resolved',
      actorId: this.actorId,
      outcome: fine > 0 ? 'fined' : 'cleared',
      fine,
    });
  }

  // === Test / restore setters ===

  setLevel(level: number): void {
    if (!Number.isFinite(level)) return;
    this.level = clamp(level, 0, HEAT_MAX);
    this.unreportedDecay = 0;
  }

  setLastIncrease(gameSeconds: number): void {
    if (Number.isFinite(gameSeconds)) this.lastIncreaseAt = gameSeconds;
  }

  /** Force the raid/warrant branch; null hands the decision back to the evidence source */
  setEvidenceOverride(hasEvidence: boolean | null): void {
    this.evidenceOverride = hasEvidence;
  }

  snapshot(): HeatSnapshot {
    return {
      actorId: this.actorId,
      level: this.level,
      sources: this.getSources(),
      lastIncreaseAt: this.lastIncreaseAt,
      activeModifiers: this.getModifiers(),
      investigations: this.getInvestigations(),
    };
  }

  /** Dials are not re-applied here; they travel with the detection snapshot */
  restore(snapshot: HeatSnapshot): void {
    this.level = clamp(Number.isFinite(snapshot.level) ? snapshot.level : 0, 0, HEAT_MAX);
    this.sources = new Map(Object.entries(snapshot.sources));
    this.lastIncreaseAt = snapshot.lastIncreaseAt;
    this.unreportedDecay = 0;
    this.modifiers = snapshot.activeModifiers.map(m => ({ ...m }));
    this.investigations = {
      ...snapshot.investigations,
      audit: { ...snapshot.investigations.audit },
    };
  }

  // === Internals ===

  private checkThresholds(oldLevel: number, newLevel: number): void {
    for (const threshold of HEAT_THRESHOLDS) {
      if (oldLevel < threshold && newLevel >= threshold) {
        this.signals.emit({ type: 'heat_threshold_crossed', actorId: this.actorId, threshold, level: newLevel });
        console.log(`[Heat] ${renderMessage(SIM_CONFIG.messages.thresholdCrossed, {
          actor: this.actorId, threshold, level: newLevel.toFixed(1),
        })}`);
        this.applyThresholdEffect(threshold);
      }
    }
  }

  private applyThresholdEffect(threshold: Threshold): void {
    switch (threshold) {
      case 30:
        this.detection.setPatrolFrequency(PATROL_BOOST_THRESHOLD_30);
        break;
      case 50:
        this.triggerInvestigation('surveillance');
        break;
      case 70:
        if (this.economy.getLegitimacyRatio(this.actorId) < AUDIT_LEGITIMACY_TRIGGER) {
          this.triggerInvestigation('audit');
        }
        break;
      case 90:
        this.triggerInvestigation(this.hasEvidence() ? 'raid' : 'arrest_warrant');
        break;
    }
  }

  private hasEvidence(): boolean {
    return this.evidenceOverride ?? this.evidence.hasEvidence(this.actorId);
  }

  private announce(investigation: InvestigationType, vars: Record<string, string | number>): void {
    this.signals.emit({ type: 'investigation_triggered', actorId: this.actorId, investigation });
    const template = SIM_CONFIG.messages.investigation[investigation];
    console.log(`[Heat] ${renderMessage(template, { actor: this.actorId, ...vars })}`);
  }

  private applyModifiers(deltaGameHours: number): void {
    if (this.modifiers.length === 0) return;

    const now = this.clock.now();
    const stepStart = now - deltaGameHours * GAME_HOUR_SECONDS;
    for (const modifier of this.modifiers) {
      // Only the part of this step before expiry counts
      const hours = modifier.expiresAt === null
        ? deltaGameHours
        : clamp((modifier.expiresAt - stepStart) / GAME_HOUR_SECONDS, 0, deltaGameHours);
      const delta = modifier.amount * hours;
      if (delta > 0) this.addHeat(delta, modifier.source);
      else if (delta < 0) this.reduceHeat(-delta, modifier.source);
    }
    this.modifiers = this.modifiers.filter(m => m.expiresAt === null || m.expiresAt > now);
  }

  private decay(deltaGameHours: number): void {
    if (this.level <= 0) return;

    const daysSinceIncrease = (this.clock.now() - this.lastIncreaseAt) / GAME_DAY_SECONDS;
    const amount = HEAT_BASE_DECAY_PER_HOUR * decayMultiplier(daysSinceIncrease) * deltaGameHours;
    const oldLevel = this.level;
    this.level = Math.max(0, this.level - amount);
    this.unreportedDecay += oldLevel - this.level;

    // Reported only when the level passes a whole point (or hits zero), with everything since the last report
    if (this.level > 0 && Math.ceil(this.level) === Math.ceil(oldLevel)) return;
    const reportedFrom = this.level + this.unreportedDecay;
    this.unreportedDecay = 0;
    this.emitDecrease(reportedFrom);
  }

  private drainBucket(amount: number, cause?: string): void {
    if (this.sources.size === 0) return;

    if (cause) {
      const named = this.sources.get(cause);
      if (named !== undefined) {
        this.sources.set(cause, Math.max(0, named - amount));
        return;
      }
    }

    let largestKey: string | null = null;
    let largestValue = 0;
    for (const [key, value] of this.sources) {
      if (value > largestValue) {
        largestValue = value;
        largestKey = key;
      }
    }
    if (largestKey !== null) {
      this.sources.set(largestKey, Math.max(0, largestValue - amount));
    }
  }

  private emitDecrease(oldLevel: number): void {
    if (this.level === oldLevel) return;
    this.signals.emit({ type: 'heat_decreased', actorId: this.actorId, amount: oldLevel - this.level, level: this.level });
    if (this.level <= 0 && oldLevel > 0) {
      this.signals.emit({ type: 'heat_cleared', actorId: this.actorId });
    }
  }
}
