import { describe, it, expect, beforeEach } from 'vitest';
import type { SimSignal, SignalOf } from '@hustle/shared';
import { HeatEngine, decayMultiplier } from '../src/simulation/heat-engine.js';
import { DetectionEngine } from '../src/simulation/detection-engine.js';
import { SignalBus } from '../src/simulation/signals.js';
import { GameClock } from '../src/simulation/game-clock.js';
import type { EconomyPort } from '../src/economy/ledger.js';

const DAY = 86400;

class FakeEconomy implements EconomyPort {
  legitimacy = 1;
  balance = 1000;
  frozen = 0;
  fines: number[] = [];
  unfreezes = 0;

  getLegitimacyRatio(): number { return this.legitimacy; }
  getBalance(): number { return this.balance; }
  freezeFunds(_actorId: string, amount: number): void { this.frozen += amount; }
  unfreezeFunds(): void {
    this.frozen = 0;
    this.unfreezes++;
  }
  applyFine(_actorId: string, amount: number): void {
    this.fines.push(amount);
    this.balance -= amount;
  }
}

let clock: GameClock;
let signals: SignalBus;
let detection: DetectionEngine;
let economy: FakeEconomy;
let heat: HeatEngine;

beforeEach(() => {
  clock = new GameClock();
  signals = new SignalBus();
  detection = new DetectionEngine({ signals });
  economy = new FakeEconomy();
  heat = new HeatEngine({ actorId: 'player', detection, economy, signals, clock });
});

function ofType<T extends SimSignal['type']>(type: T): SignalOf<T>[] {
  return signals.pending().filter((s): s is SignalOf<T> => s.type === type);
}

describe('HeatEngine.addHeat', () => {
  it('crosses 30 and boosts patrols on a fresh state', () => {
    heat.addHeat(35, 'drug_dealing');

    expect(heat.getLevel()).toBe(35);
    expect(heat.getSources()).toEqual({ drug_dealing: 35 });
    expect(ofType('heat_threshold_crossed').map(s => s.threshold)).toEqual([30]);
    expect(detection.getDials().patrolFrequencyMultiplier).toBeCloseTo(1.2);
    expect(detection.getDials().detectionSensitivityMultiplier).toBe(1);
  });

  it('skips the audit at 70 when income looks legitimate', () => {
    economy.legitimacy = 0.9;
    heat.setLevel(65);
    heat.addHeat(10, 'cash_deposit');

    expect(heat.getLevel()).toBe(75);
    expect(ofType('heat_threshold_crossed').map(s => s.threshold)).toEqual([70]);
    expect(ofType('investigation_triggered')).toEqual([]);
    expect(heat.getInvestigations().audit.active).toBe(false);
    expect(economy.frozen).toBe(0);
  });

  it('opens an audit at 70 when legitimacy is low', () => {
    economy.legitimacy = 0.4;
    heat.setLevel(65);
    heat.addHeat(10, 'cash_deposit');

    expect(heat.getInvestigations().audit).toEqual({ active: true, frozenAmount: 300, resolvesAt: 30 * DAY });
    expect(economy.frozen).toBe(300);
    expect(ofType('investigation_triggered').map(s => s.investigation)).toEqual(['audit']);
  });

  it('does not open a second audit while one is running', () => {
    economy.legitimacy = 0.4;
    heat.setLevel(65);
    heat.addHeat(10, 'a');
    heat.setLevel(65);
    heat.addHeat(10, 'b');

    expect(economy.frozen).toBe(300);
    expect(ofType('investigation_triggered')).toHaveLength(1);
  });

  it('fires every crossed threshold in order and issues a warrant without evidence', () => {
    heat.addHeat(95, 'drug_dealing');

    expect(ofType('heat_threshold_crossed').map(s => s.threshold)).toEqual([30, 50, 70, 90]);
    expect(ofType('investigation_triggered').map(s => s.investigation)).toEqual(['surveillance', 'arrest_warrant']);
    expect(heat.getInvestigations().surveillanceActive).toBe(true);
    expect(heat.getInvestigations().warrantActive).toBe(true);
    // 1.2 * 1.5 * 2
    expect(detection.getDials().patrolFrequencyMultiplier).toBeCloseTo(3.6);
    expect(detection.getDials().detectionSensitivityMultiplier).toBeCloseTo(1.3);
  });

  it('raids and halves heat when evidence exists', () => {
    heat.setEvidenceOverride(true);
    heat.addHeat(95, 'drug_dealing');

    expect(heat.getLevel()).toBe(47.5);
    expect(heat.getInvestigations().warrantActive).toBe(false);
    expect(ofType('investigation_triggered').map(s => s.investigation)).toEqual(['surveillance', 'raid']);
    expect(ofType('heat_decreased')).toEqual([{ type: 'heat_decreased', actorId: 'player', amount: 47.5, level: 47.5 }]);
  });

  it('asks the evidence source when no override is set', () => {
    const withEvidence = new HeatEngine({
      actorId: 'player', detection, economy, signals, clock,
      evidence: { hasEvidence: (actorId) => actorId === 'player' },
    });
    withEvidence.addHeat(90, 'x');
    expect(withEvidence.getLevel()).toBe(45);
  });

  it('triggers surveillance once while heat stays above 50', () => {
    heat.addHeat(55, 'drug_dealing');
    heat.reduceHeat(3);
    heat.addHeat(3, 'drug_dealing');
    heat.reduceHeat(4);
    heat.addHeat(8, 'drug_dealing');

    expect(ofType('investigation_triggered').filter(s => s.investigation === 'surveillance')).toHaveLength(1);
    expect(detection.getDials().patrolFrequencyMultiplier).toBeCloseTo(1.8);
  });

  it('clamps the level but attributes the full amount', () => {
    heat.addHeat(150, 'arson');
    expect(heat.getLevel()).toBe(100);
    expect(heat.getSources()).toEqual({ arson: 150 });
  });

  it('ignores non-positive amounts', () => {
    heat.addHeat(0, 'x');
    heat.addHeat(-5, 'x');
    expect(heat.getLevel()).toBe(0);
    expect(signals.pending()).toEqual([]);
  });

  it('files an empty cause under unknown', () => {
    heat.addHeat(5, '');
    expect(heat.getSources()).toEqual({ unknown: 5 });
  });
});

describe('HeatEngine.reduceHeat', () => {
  beforeEach(() => {
    heat.addHeat(10, 'a');
    heat.addHeat(30, 'b');
    heat.addHeat(30, 'c');
    signals.clear();
  });

  it('drains the largest bucket, first-inserted on a tie', () => {
    heat.reduceHeat(5);
    expect(heat.getLevel()).toBe(65);
    expect(heat.getSources()).toEqual({ a: 10, b: 25, c: 30 });

    heat.reduceHeat(5);
    expect(heat.getSources()).toEqual({ a: 10, b: 25, c: 25 });
  });

  it('drains the named bucket when it exists', () => {
    heat.reduceHeat(5, 'a');
    expect(heat.getSources()).toEqual({ a: 5, b: 30, c: 30 });

    heat.reduceHeat(50, 'a');
    expect(heat.getSources().a).toBe(0);
  });

  it('falls back to the largest bucket for an unknown cause', () => {
    heat.reduceHeat(5, 'bribe');
    expect(heat.getSources()).toEqual({ a: 10, b: 25, c: 30 });
  });

  it('signals a clear when heat reaches zero', () => {
    heat.reduceHeat(100);
    expect(heat.getLevel()).toBe(0);
    expect(signals.pending().map(s => s.type)).toEqual(['heat_decreased', 'heat_cleared']);
  });
});

describe('HeatEngine decay', () => {
  it('picks the multiplier from time since the last increase', () => {
    expect(decayMultiplier(0.5)).toBe(0.5);
    expect(decayMultiplier(1)).toBe(1);
    expect(decayMultiplier(7)).toBe(1);
    expect(decayMultiplier(8)).toBe(2);
    expect(decayMultiplier(30)).toBe(2);
    expect(decayMultiplier(31)).toBe(3);
  });

  it('decays fresh heat at half speed', () => {
    heat.setLevel(50);
    heat.setLastIncrease(0);
    heat.tick(24);
    expect(heat.getLevel()).toBeCloseTo(49.5);
  });

  it('speeds up as heat gets older', () => {
    heat.setLevel(50);
    heat.setLastIncrease(0);

    clock.advanceSeconds(2 * DAY);
    heat.tick(24);
    expect(heat.getLevel()).toBeCloseTo(49);

    clock.advanceSeconds(8 * DAY);
    heat.tick(24);
    expect(heat.getLevel()).toBeCloseTo(47);

    clock.advanceSeconds(21 * DAY);
    heat.tick(24);
    expect(heat.getLevel()).toBeCloseTo(44);
  });

  it('never rises between increases and strictly falls after a day', () => {
    heat.addHeat(20, 'x');
    const levels: number[] = [heat.getLevel()];
    for (let h = 0; h < 72; h++) {
      clock.advanceSeconds(3600);
      heat.tick(1);
      levels.push(heat.getLevel());
    }
    for (let i = 1; i < levels.length; i++) {
      expect(levels[i]).toBeLessThanOrEqual(levels[i - 1]);
    }
    for (let i = 26; i < levels.length; i++) {
      expect(levels[i]).toBeLessThan(levels[i - 1]);
    }
  });

  it('reports decay only as the level passes a whole point', () => {
    heat.setLevel(10.2);
    heat.setLastIncrease(0);
    clock.advanceSeconds(2 * DAY);

    for (let h = 0; h < 24; h++) heat.tick(1);

    const decreases = ofType('heat_decreased');
    expect(decreases).toHaveLength(1);
    expect(decreases[0].amount).toBeCloseTo(5 / 24);
    expect(decreases[0].level).toBeCloseTo(10.2 - 5 / 24);
    expect(heat.getLevel()).toBeCloseTo(9.2);
  });

  it('clears once and then stays quiet', () => {
    heat.setLevel(0.01);
    heat.tick(24);
    heat.tick(24);
    expect(heat.getLevel()).toBe(0);
    expect(signals.pending().map(s => s.type)).toEqual(['heat_decreased', 'heat_cleared']);
  });
});

describe('HeatEngine audits', () => {
  beforeEach(() => {
    economy.legitimacy = 0.4;
    heat.setLevel(65);
    heat.addHeat(10, 'cash_deposit');
    signals.clear();
  });

  it('waits for the deadline', () => {
    clock.advanceSeconds(29 * DAY);
    heat.tick(1);
    expect(heat.getInvestigations().audit.active).toBe(true);
  });

  it('fines 20% of the balance on a dirty record', () => {
    clock.advanceSeconds(30 * DAY);
    heat.tick(1);

    expect(economy.fines).toEqual([200]);
    expect(economy.balance).toBe(800);
    expect(economy.frozen).toBe(0);
    expect(heat.getInvestigations().audit).toEqual({ active: false, frozenAmount: 0, resolvesAt: null });
    expect(ofType('audit_resolved')).toEqual([{ type: 'audit_resolved', actorId: 'player', outcome: 'fined', fine: 200 }]);
  });

  it('only unfreezes on a clean record', () => {
    economy.legitimacy = 0.8;
    clock.advanceSeconds(31 * DAY);
    heat.tick(1);

    expect(economy.fines).toEqual([]);
    expect(economy.unfreezes).toBe(1);
    expect(ofType('audit_resolved')).toEqual([{ type: 'audit_resolved', actorId: 'player', outcome: 'cleared', fine: 0 }]);
  });
});

describe('HeatEngine warrants', () => {
  it('resolves a warrant and winds patrols back down', () => {
    heat.addHeat(95, 'x');
    expect(heat.resolveWarrant()).toBe(true);
    expect(heat.getInvestigations().warrantActive).toBe(false);
    expect(detection.getDials().patrolFrequencyMultiplier).toBeCloseTo(1.8);
    expect(heat.resolveWarrant()).toBe(false);
  });
});

describe('HeatEngine economy hooks', () => {
  it('flags large deposits and dirty income', () => {
    heat.onSuspiciousTransaction(8000, 'Salary');
    expect(heat.getSources()).toEqual({ cash_deposit: 4 });

    heat.onSuspiciousTransaction(5000, 'DrugSale');
    heat.onSuspiciousTransaction(100, 'sexwork');
    expect(heat.getSources()).toEqual({ cash_deposit: 4, suspicious_income: 4 });
    expect(heat.getLevel()).toBe(8);
  });

  it('flags only very vain purchases', () => {
    heat.onFlashyPurchase(70);
    expect(heat.getLevel()).toBe(0);
    heat.onFlashyPurchase(80);
    expect(heat.getSources()).toEqual({ flashy_purchase: 8 });
  });
});

describe('HeatEngine modifiers', () => {
  it('applies a timed modifier until it expires', () => {
    expect(heat.addModifier('gossip', 2, 3)).toBe(true);

    clock.advanceSeconds(3600);
    heat.tick(1);
    expect(heat.getSources()).toEqual({ gossip: 2 });

    clock.advanceSeconds(3 * 3600);
    heat.tick(3);
    expect(heat.getSources()).toEqual({ gossip: 6 });
    expect(heat.getModifiers()).toEqual([]);
  });

  it('drains heat with a permanent negative modifier', () => {
    heat.setLevel(10);
    heat.addModifier('lawyer', -2, null);

    clock.advanceSeconds(3600);
    heat.tick(1);
    expect(heat.getLevel()).toBeCloseTo(8 - 1 / 48);
    expect(heat.getModifiers()).toEqual([{ source: 'lawyer', amount: -2, expiresAt: null }]);
  });

  it('stops an open-ended modifier once removed', () => {
    heat.addModifier('gossip', 2, null);
    clock.advanceSeconds(3600);
    heat.tick(1);

    expect(heat.removeModifier('gossip')).toBe(true);
    expect(heat.removeModifier('gossip')).toBe(false);

    clock.advanceSeconds(3600);
    heat.tick(1);
    expect(heat.getSources()).toEqual({ gossip: 2 });
    expect(heat.getModifiers()).toEqual([]);
  });

  it('rejects zero rates and non-positive durations', () => {
    expect(heat.addModifier('x', 0, 1)).toBe(false);
    expect(heat.addModifier('x', 1, 0)).toBe(false);
    expect(heat.getModifiers()).toEqual([]);
  });
});

describe('HeatEngine snapshots', () => {
  it('round-trips level, sources and investigations', () => {
    heat.addHeat(55, 'drug_dealing');
    heat.addModifier('gossip', 1, null);

    const other = new HeatEngine({ actorId: 'player', detection, economy, signals: new SignalBus(), clock });
    other.restore(heat.snapshot());

    expect(other.snapshot()).toEqual(heat.snapshot());
    expect(other.getInvestigations().surveillanceActive).toBe(true);
  });
});
