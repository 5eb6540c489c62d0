import { describe, it, expect } from 'vitest';
import type { ObserverData, SimSignalType } from '@hustle/shared';
import { observerFromPreset } from '@hustle/shared';
import { Simulation } from '../src/simulation/simulation.js';
import { Ledger } from '../src/economy/ledger.js';
import { fixedRandom } from '../src/simulation/random.js';

function cop(): ObserverData {
  return observerFromPreset('cop', {
    position: { x: 0, y: 0, z: 0 },
    facing: { x: 0, y: 0, z: 1 },
    currentLocation: 'street',
  });
}

function record(sim: Simulation): SimSignalType[] {
  const seen: SimSignalType[] = [];
  sim.signals.onAny((s) => seen.push(s.type));
  return seen;
}

describe('Simulation.step', () => {
  it('turns a detection into heat within the same step', () => {
    const sim = new Simulation({ random: fixedRandom(0.5) });
    const seen = record(sim);
    sim.detection.registerObserver('cop1', cop());
    sim.detection.setActorPose('player', { x: 0, y: 0, z: 3 }, 'street');
    sim.activities.create('physical', 'drug_dealing', 600);

    sim.step(1);

    expect(seen).toEqual(['activity_started', 'player_detected', 'activity_caught', 'heat_increased']);
    // severity 1 * 10, less a sliver of fresh decay
    expect(sim.heat.getSources()).toEqual({ drug_dealing: 10 });
    expect(sim.heat.getLevel()).toBeCloseTo(10, 3);
  });

  it('adds no heat when a legal activity is noticed', () => {
    const sim = new Simulation();
    sim.detection.registerObserver('boss', observerFromPreset('boss', {
      position: { x: 0, y: 0, z: 0 },
      facing: { x: 0, y: 0, z: 1 },
      currentLocation: 'office',
    }));
    sim.detection.setActorPose('player', { x: 0, y: 0, z: 2 }, 'office');
    const id = sim.activities.create('physical', 'slacking', 600);

    sim.step(1);

    expect(sim.activities.getActivity(id)?.wasDetected).toBe(true);
    expect(sim.heat.getLevel()).toBe(0);
  });

  it('closes the loop back into the detection dials', () => {
    const sim = new Simulation({ heatPerDetection: 35 });
    sim.detection.registerObserver('cop1', cop());
    sim.detection.setActorPose('player', { x: 0, y: 0, z: 3 }, 'street');
    sim.activities.create('physical', 'drug_dealing', 600);

    sim.step(1);

    expect(sim.detection.getDials().patrolFrequencyMultiplier).toBeCloseTo(1.2);
  });

  it('ignores activities of other owners', () => {
    const sim = new Simulation();
    sim.detection.registerObserver('cop1', cop());
    sim.detection.setActorPose('npc', { x: 0, y: 0, z: 3 }, 'street');
    sim.activities.create('physical', 'drug_dealing', 600, { ownerId: 'npc' });

    sim.step(1);

    expect(sim.heat.getLevel()).toBe(0);
  });

  it('feeds ledger income into heat', () => {
    const ledger = new Ledger();
    const sim = new Simulation({ economy: ledger });
    ledger.addIncome('player', 8000, 'DrugSale');

    expect(sim.heat.getSources()).toEqual({ cash_deposit: 4, suspicious_income: 2 });
    expect(sim.heat.getLevel()).toBe(6);
  });

  it('keeps slow decay off the signal bus', () => {
    const sim = new Simulation();
    const seen = record(sim);
    sim.heat.addHeat(40, 'drug_dealing');

    // One real minute at 10 Hz
    for (let i = 0; i < 600; i++) sim.step(6);

    expect(seen).toEqual(['heat_increased', 'heat_threshold_crossed']);
    expect(sim.heat.getLevel()).toBeCloseTo(40 - 1 / 48, 6);
  });

  it('ignores non-positive steps', () => {
    const sim = new Simulation();
    sim.step(0);
    sim.step(-5);
    expect(sim.clock.now()).toBe(0);
  });
});

describe('Simulation.run', () => {
  it('advances the clock and finishes activities', () => {
    const sim = new Simulation();
    const id = sim.activities.create('passive', 'phone_browsing', 1800);

    sim.run(1);

    expect(sim.clock.now()).toBe(3600);
    expect(sim.activities.getActivity(id)).toBeUndefined();
  });
});

describe('Simulation snapshots', () => {
  it('reports and restores state', () => {
    const sim = new Simulation({ heatPerDetection: 35 });
    sim.detection.registerObserver('cop1', cop());
    sim.detection.setActorPose('player', { x: 0, y: 0, z: 3 }, 'street');
    sim.activities.create('passive', 'phone_browsing', 600);
    sim.heat.addHeat(40, 'drug_dealing');
    sim.step(60);

    const status = sim.statusUpdate();
    expect(status.actor_id).toBe('player');
    expect(status.game_time).toBe(60);
    expect(status.activities).toHaveLength(1);
    expect(status.observers).toHaveLength(1);

    const copy = new Simulation();
    copy.restore(sim.snapshot());
    expect(copy.statusUpdate()).toEqual(status);
  });
});
