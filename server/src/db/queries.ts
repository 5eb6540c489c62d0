import { getDb } from './database.js';
import type { DetectionDials, HeatSnapshot, Observer, SimSignal } from '@hustle/shared';

// === Simulation state ===

export interface SimStateRow {
  game_time: number;
  patrol_multiplier: number;
  sensitivity_multiplier: number;
  last_save: number;
}

export function getSimState(): SimStateRow {
  return getDb().prepare('SELECT game_time, patrol_multiplier, sensitivity_multiplier, last_save FROM sim_state WHERE id = 1').get() as SimStateRow;
}

export function saveSimState(gameTime: number, dials: DetectionDials): void {
  getDb().prepare(`
    UPDATE sim_state SET game_time = ?, patrol_multiplier = ?, sensitivity_multiplier = ?, last_save = ? WHERE id = 1
  `).run(gameTime, dials.patrolFrequencyMultiplier, dials.detectionSensitivityMultiplier, Date.now());
}

// === Heat ===

interface HeatStateRow {
  actor_id: string;
  level: number;
  sources_json: string;
  last_increase_at: number;
  modifiers_json: string;
  investigations_json: string;
  updated_at: number;
}

export function saveHeatState(snapshot: HeatSnapshot): void {
  getDb().prepare(`
    INSERT INTO heat_state (actor_id, level, sources_json, last_increase_at, modifiers_json, investigations_json, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(actor_id) DO UPDATE SET
      level = excluded.level,
      sources_json = excluded.sources_json,
      last_increase_at = excluded.last_increase_at,
      modifiers_json = excluded.modifiers_json,
      investigations_json = excluded.investigations_json,
      updated_at = excluded.updated_at
  `).run(
    snapshot.actorId,
    snapshot.level,
    JSON.stringify(snapshot.sources),
    snapshot.lastIncreaseAt,
    JSON.stringify(snapshot.activeModifiers),
    JSON.stringify(snapshot.investigations),
    Date.now(),
  );
}

export function loadHeatState(actorId: string): HeatSnapshot | null {
  const row = getDb().prepare('SELECT * FROM heat_state WHERE actor_id = ?').get(actorId) as HeatStateRow | undefined;
  if (!row) return null;
  return {
    actorId: row.actor_id,
    level: row.level,
    sources: JSON.parse(row.sources_json),
    lastIncreaseAt: row.last_increase_at,
    activeModifiers: JSON.parse(row.modifiers_json),
    investigations: JSON.parse(row.investigations_json),
  };
}

// === Observers ===

interface ObserverRow {
  id: string;
  role: string;
  location: string;
  data_json: string;
  updated_at: number;
}

/** Replace the stored registry with `observers` */
export function saveObservers(observers: Observer[]): void {
  const db = getDb();
  const clear = db.prepare('DELETE FROM observers');
  const insert = db.prepare(`
    INSERT INTO observers (id, role, location, data_json, updated_at) VALUES (?, ?, ?, ?, ?)
  `);
  const now = Date.now();
  const saveAll = db.transaction((list: Observer[]) => {
    clear.run();
    for (const o of list) {
      insert.run(o.id, o.role, o.currentLocation, JSON.stringify(o), now);
    }
  });
  saveAll(observers);
}

export function loadObservers(): Observer[] {
  const rows = getDb().prepare('SELECT * FROM observers ORDER BY rowid').all() as ObserverRow[];
  return rows.map(row => JSON.parse(row.data_json));
}

// === Events ===

export interface EventRow {
  id: number;
  timestamp: number;
  game_time: number;
  type: string;
  actor_id: string | null;
  data_json: string;
}

function signalActor(signal: SimSignal): string | null {
  if ('actorId' in signal) return signal.actorId;
  if ('ownerId' in signal) return signal.ownerId;
  if (signal.type === 'activity_ended') return signal.result.ownerId;
  return null;
}

export function logEvent(
  type: string,
  actorId: string | null,
  gameTime: number,
  data: Record<string, unknown>,
): void {
  getDb().prepare(`
    INSERT INTO events (timestamp, game_time, type, actor_id, data_json)
    VALUES (?, ?, ?, ?, ?)
  `).run(Date.now(), gameTime, type, actorId, JSON.stringify(data));
}

export function logSignal(signal: SimSignal, gameTime: number): void {
  logEvent(signal.type, signalActor(signal), gameTime, { ...signal });
}

export function getRecentEvents(limit: number = 50, type?: string): EventRow[] {
  if (type) {
    return getDb().prepare(`
      SELECT * FROM events WHERE type = ? ORDER BY id DESC LIMIT ?
    `).all(type, limit) as EventRow[];
  }
  return getDb().prepare(`
    SELECT * FROM events ORDER BY id DESC LIMIT ?
  `).all(limit) as EventRow[];
}
