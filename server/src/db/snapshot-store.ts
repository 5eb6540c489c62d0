import type { Simulation } from '../simulation/simulation.js';
import {
  getSimState, saveSimState, saveHeatState, loadHeatState, saveObservers, loadObservers,
} from './queries.js';
import { getDb } from './database.js';

/** Persist clock, dials, heat and the observer registry in one transaction */
export function saveSimulation(sim: Simulation): void {
  const save = getDb().transaction(() => {
    saveSimState(sim.clock.now(), sim.detection.getDials());
    saveHeatState(sim.heat.snapshot());
    saveObservers(sim.detection.listObservers());
  });
  save();
}

/**
 * Restore whatever was saved. Actor poses and live activities are not
 * persisted; they come back from the next client update.
 */
export function loadSimulation(sim: Simulation): { observers: number; heat: number | null } {
  const state = getSimState();
  sim.clock.set(state.game_time);

  const observers = loadObservers();
  sim.detection.restore({
    observers,
    actors: [],
    dials: {
      patrolFrequencyMultiplier: state.patrol_multiplier,
      detectionSensitivityMultiplier: state.sensitivity_multiplier,
    },
    elapsedSeconds: state.game_time,
  });

  const heat = loadHeatState(sim.actorId);
  if (heat) sim.heat.restore(heat);

  console.log(`[DB] Loaded ${observers.length} observers, heat ${heat ? heat.level.toFixed(1) : 'none'} for ${sim.actorId}`);
  return { observers: observers.length, heat: heat ? heat.level : null };
}
