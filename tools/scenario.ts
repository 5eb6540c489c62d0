import { readFileSync } from 'fs';
import type {
  ActivityKind, IncomeSource, MultitaskingLevel, ObserverRole, SimSignal, StatusUpdate, Vec3,
} from '@hustle/shared';
import { GAME_HOUR_SECONDS, observerFromPreset } from '@hustle/shared';
import { Simulation } from '../server/src/simulation/simulation.js';
import { Ledger } from '../server/src/economy/ledger.js';
import { OcclusionGrid } from '../server/src/simulation/occlusion.js';
import { seededRandom } from '../server/src/simulation/random.js';

export interface ScenarioObserver {
  id: string;
  role: ObserverRole;
  position: Vec3;
  facing?: Vec3;
  location: string;
  vision_range?: number;
  patrol?: { waypoints: Vec3[]; interval_seconds: number };
}

interface Scheduled {
  at_hour: number;
}

export interface ScenarioActivity extends Scheduled {
  kind: ActivityKind;
  risk_tag: string;
  duration_seconds: number;
  multitasking_level?: MultitaskingLevel;
}

export interface ScenarioIncome extends Scheduled {
  amount: number;
  source: IncomeSource;
}

export interface ScenarioPurchase extends Scheduled {
  vanity: number;
}

export interface ScenarioPose extends Scheduled {
  position: Vec3;
  location: string;
}

export interface Scenario {
  name: string;
  hours: number;
  step_seconds?: number;
  seed?: number;
  actor_id?: string;
  /** Use the default occlusion grid (or OCCLUSION_MAP) for line of sight */
  occlusion?: boolean;
  evidence?: boolean;
  actor: { position: Vec3; location: string };
  observers: ScenarioObserver[];
  activities?: ScenarioActivity[];
  income?: ScenarioIncome[];
  purchases?: ScenarioPurchase[];
  moves?: ScenarioPose[];
}

export interface ScenarioRun {
  signals: Array<{ game_time: number; signal: SimSignal }>;
  final: StatusUpdate;
  balance: number;
}

export function loadScenario(path: string): Scenario {
  const raw = readFileSync(path, 'utf-8');
  const scenario: Scenario = JSON.parse(raw);
  validateScenario(scenario);
  return scenario;
}

export function validateScenario(s: Scenario): void {
  if (!s.name || typeof s.name !== 'string') {
    throw new Error('name is required');
  }
  if (!(s.hours > 0)) {
    throw new Error('hours must be positive');
  }
  if (s.step_seconds !== undefined && !(s.step_seconds > 0)) {
    throw new Error('step_seconds must be positive');
  }
  if (!s.actor || !s.actor.position || !s.actor.location) {
    throw new Error('actor.position and actor.location are required');
  }
  if (!Array.isArray(s.observers)) {
    throw new Error('observers must be an array');
  }
  for (const o of s.observers) {
    if (!o.id || !o.role || !o.position || !o.location) {
      throw new Error(`observer ${o.id || '(unnamed)'} needs id, role, position and location`);
    }
  }
}

/** Play a scenario headless and collect every signal in delivery order */
export function runScenario(scenario: Scenario, seedOverride?: number, hoursOverride?: number): ScenarioRun {
  const ledger = new Ledger();
  const sim = new Simulation({
    actorId: scenario.actor_id,
    economy: ledger,
    random: seededRandom(seedOverride ?? scenario.seed ?? 1),
    lineOfSight: scenario.occlusion ? OcclusionGrid.loadFromFile() : undefined,
  });
  if (scenario.evidence !== undefined) sim.heat.setEvidenceOverride(scenario.evidence);

  const signals: ScenarioRun['signals'] = [];
  sim.signals.onAny((signal) => signals.push({ game_time: sim.clock.now(), signal }));

  sim.detection.setActorPose(sim.actorId, scenario.actor.position, scenario.actor.location);
  for (const o of scenario.observers) {
    const data = observerFromPreset(o.role, {
      position: o.position,
      facing: o.facing ?? { x: 0, y: 0, z: 1 },
      currentLocation: o.location,
    });
    if (o.vision_range !== undefined) data.visionRange = o.vision_range;
    sim.detection.registerObserver(o.id, data);
    if (o.patrol) sim.detection.setPatrolRoute(o.id, o.patrol.waypoints, o.patrol.interval_seconds);
  }

  const pending = {
    activities: sortByHour(scenario.activities ?? []),
    income: sortByHour(scenario.income ?? []),
    purchases: sortByHour(scenario.purchases ?? []),
    moves: sortByHour(scenario.moves ?? []),
  };

  const stepSeconds = scenario.step_seconds ?? 60;
  const totalSeconds = (hoursOverride ?? scenario.hours) * GAME_HOUR_SECONDS;

  while (sim.clock.now() < totalSeconds) {
    const hour = sim.clock.now() / GAME_HOUR_SECONDS;
    for (const move of due(pending.moves, hour)) {
      sim.detection.setActorPose(sim.actorId, move.position, move.location);
    }
    for (const a of due(pending.activities, hour)) {
      sim.activities.create(a.kind, a.risk_tag, a.duration_seconds, { multitaskingLevel: a.multitasking_level });
    }
    for (const i of due(pending.income, hour)) {
      ledger.addIncome(sim.actorId, i.amount, i.source);
    }
    for (const p of due(pending.purchases, hour)) {
      sim.heat.onFlashyPurchase(p.vanity);
    }
    sim.signals.flush();

    sim.step(Math.min(stepSeconds, totalSeconds - sim.clock.now()));
  }

  return { signals, final: sim.statusUpdate(), balance: ledger.getBalance(sim.actorId) };
}

function sortByHour<T extends Scheduled>(items: T[]): T[] {
  return [...items].sort((a, b) => a.at_hour - b.at_hour);
}

/** Remove and return the items due by `hour` */
function due<T extends Scheduled>(queue: T[], hour: number): T[] {
  let n = 0;
  while (n < queue.length && queue[n].at_hour <= hour) n++;
  return queue.splice(0, n);
}
