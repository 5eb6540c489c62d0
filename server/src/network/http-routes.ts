import type { IncomingMessage, ServerResponse } from 'http';
import type { ActivityKind, ActivityPhase, MultitaskingLevel, ObserverRole, Vec3 } from '@hustle/shared';
import { SIM_CONFIG, observerFromPreset } from '@hustle/shared';
import type { Simulation } from '../simulation/simulation.js';
import { getRecentEvents } from '../db/queries.js';

const ACTIVITY_KINDS: ActivityKind[] = ['physical', 'screen', 'passive'];
const MULTITASKING_LEVELS: MultitaskingLevel[] = ['full', 'partial', 'breaks', 'none'];
const OBSERVER_ROLES: ObserverRole[] = ['boss', 'cop', 'coworker', 'security', 'civilian'];
const MAX_BODY_BYTES = 64 * 1024;

interface ActivityBody {
  kind?: string;
  risk_tag?: string;
  duration_seconds?: number;
  owner_id?: string;
  multitasking_level?: string;
  required_attention?: number;
  phases?: ActivityPhase[];
}

interface ObserverBody {
  role?: string;
  position?: unknown;
  facing?: unknown;
  location?: string;
  vision_range?: number;
  vision_cone_degrees?: number;
  cares_about_legality?: boolean;
  cares_about_job_performance?: boolean;
  patrol?: { waypoints?: unknown[]; interval_seconds?: number };
}

interface HeatBody {
  amount?: number;
  cause?: string;
}

interface ModifierBody {
  source?: string;
  amount_per_hour?: number;
  duration_hours?: number | null;
}

interface PoseBody {
  actor_id?: string;
  position?: unknown;
  location?: string;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function isVec3(v: unknown): v is Vec3 {
  if (typeof v !== 'object' || v === null) return false;
  if (!('x' in v) || !('y' in v) || !('z' in v)) return false;
  return typeof v.x === 'number' && typeof v.y === 'number' && typeof v.z === 'number'
    && Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}

function isOneOf<T extends string>(list: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && list.some(item => item === value);
}

/** Collect a JSON body; answers 400 itself when the body is not usable */
function readJson<T>(req: IncomingMessage, res: ServerResponse, handle: (data: T) => void): void {
  let body = '';
  let tooLarge = false;
  req.on('data', chunk => {
    // Past the limit the rest of the stream is drained, not kept
    if (tooLarge) return;
    body += chunk;
    if (body.length > MAX_BODY_BYTES) {
      tooLarge = true;
      body = '';
    }
  });
  req.on('end', () => {
    if (tooLarge) {
      sendJson(res, 400, { error: 'Request body too large' });
      return;
    }
    let data: T;
    try {
      data = JSON.parse(body || '{}');
    } catch {
      sendJson(res, 400, { error: 'Invalid JSON' });
      return;
    }
    if (typeof data !== 'object' || data === null) {
      sendJson(res, 400, { error: 'Body must be a JSON object' });
      return;
    }
    handle(data);
  });
}

export function handleHttpRequest(
  req: IncomingMessage,
  res: ServerResponse,
  sim: Simulation,
): boolean {
  const url = new URL(req.url || '/', `http://${req.headers.host || 'localhost'}`);

  // CORS headers
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

  if (req.method === 'OPTIONS') {
    res.writeHead(204);
    res.end();
    return true;
  }

  // GET /api/status: Server status
  if (req.method === 'GET' && url.pathname === '/api/status') {
    sendJson(res, 200, {
      status: 'running',
      name: SIM_CONFIG.name,
      game_time: sim.clock.now(),
      actor_id: sim.actorId,
      heat: sim.heat.getLevel(),
      activities: sim.activities.getActiveActivities(sim.actorId).length,
      observers: sim.detection.listObservers().length,
      dials: sim.detection.getDials(),
    });
    return true;
  }

  // GET /api/heat: Level, provenance and open investigations
  if (req.method === 'GET' && url.pathname === '/api/heat') {
    sendJson(res, 200, heatView(sim));
    return true;
  }

  // POST /api/heat: Add heat for a cause
  if (req.method === 'POST' && url.pathname === '/api/heat') {
    readJson<HeatBody>(req, res, (data) => {
      if (typeof data.amount !== 'number' || !(data.amount > 0)) {
        sendJson(res, 400, { error: 'amount must be a positive number' });
        return;
      }
      sim.heat.addHeat(data.amount, typeof data.cause === 'string' ? data.cause : undefined);
      sim.signals.flush();
      sendJson(res, 200, heatView(sim));
    });
    return true;
  }

  // POST /api/heat/reduce: Pay down a bucket (or the largest one)
  if (req.method === 'POST' && url.pathname === '/api/heat/reduce') {
    readJson<HeatBody>(req, res, (data) => {
      if (typeof data.amount !== 'number' || !(data.amount > 0)) {
        sendJson(res, 400, { error: 'amount must be a positive number' });
        return;
      }
      sim.heat.reduceHeat(data.amount, typeof data.cause === 'string' ? data.cause : undefined);
      sim.signals.flush();
      sendJson(res, 200, heatView(sim));
    });
    return true;
  }

  // POST /api/heat/modifiers: Ongoing heat per game hour (null duration = until removed)
  if (req.method === 'POST' && url.pathname === '/api/heat/modifiers') {
    readJson<ModifierBody>(req, res, (data) => {
      if (typeof data.source !== 'string' || !data.source) {
        sendJson(res, 400, { error: 'source is required' });
        return;
      }
      if (typeof data.amount_per_hour !== 'number') {
        sendJson(res, 400, { error: 'amount_per_hour must be a number' });
        return;
      }
      const duration = typeof data.duration_hours === 'number' ? data.duration_hours : null;
      if (!sim.heat.addModifier(data.source, data.amount_per_hour, duration)) {
        sendJson(res, 400, { error: 'Modifier rejected' });
        return;
      }
      sendJson(res, 201, heatView(sim));
    });
    return true;
  }

  // DELETE /api/heat/modifiers/:source
  const modifierPath = url.pathname.match(/^\/api\/heat\/modifiers\/([^/]+)$/);
  if (req.method === 'DELETE' && modifierPath) {
    const source = decodeURIComponent(modifierPath[1]);
    if (!sim.heat.removeModifier(source)) {
      sendJson(res, 404, { error: 'Modifier not found' });
    } else {
      sendJson(res, 200, heatView(sim));
    }
    return true;
  }

  // GET /api/activities: Live activities (optionally ?owner=)
  if (req.method === 'GET' && url.pathname === '/api/activities') {
    const owner = url.searchParams.get('owner');
    sendJson(res, 200, { activities: owner ? sim.activities.getActiveActivities(owner) : sim.activities.listActivities() });
    return true;
  }

  // POST /api/activities: Start an activity
  if (req.method === 'POST' && url.pathname === '/api/activities') {
    readJson<ActivityBody>(req, res, (data) => {
      if (!isOneOf(ACTIVITY_KINDS, data.kind)) {
        sendJson(res, 400, { error: `kind must be one of ${ACTIVITY_KINDS.join(', ')}` });
        return;
      }
      if (typeof data.risk_tag !== 'string') {
        sendJson(res, 400, { error: 'risk_tag is required' });
        return;
      }
      if (typeof data.duration_seconds !== 'number') {
        sendJson(res, 400, { error: 'duration_seconds must be a number' });
        return;
      }
      if (data.multitasking_level !== undefined && !isOneOf(MULTITASKING_LEVELS, data.multitasking_level)) {
        sendJson(res, 400, { error: `multitasking_level must be one of ${MULTITASKING_LEVELS.join(', ')}` });
        return;
      }

      const id = sim.activities.create(data.kind, data.risk_tag, data.duration_seconds, {
        ownerId: typeof data.owner_id === 'string' ? data.owner_id : undefined,
        multitaskingLevel: isOneOf(MULTITASKING_LEVELS, data.multitasking_level) ? data.multitasking_level : undefined,
        requiredAttention: typeof data.required_attention === 'number' ? data.required_attention : undefined,
        phases: Array.isArray(data.phases) ? data.phases : undefined,
      });
      sim.signals.flush();
      sendJson(res, 201, { id, activity: sim.activities.getActivity(id) ?? null });
    });
    return true;
  }

  // POST /api/activities/:id/(pause|resume|end)
  const activityAction = url.pathname.match(/^\/api\/activities\/([^/]+)\/(pause|resume|end)$/);
  if (req.method === 'POST' && activityAction) {
    const [, id, action] = activityAction;
    if (!sim.activities.getActivity(id)) {
      sendJson(res, 404, { error: 'Activity not found' });
      return true;
    }
    if (action === 'end') {
      const result = sim.activities.end(id);
      sim.signals.flush();
      sendJson(res, 200, { result });
      return true;
    }
    const success = action === 'pause' ? sim.activities.pause(id) : sim.activities.resume(id);
    sim.signals.flush();
    sendJson(res, 200, {
      success,
      message: success ? `Activity ${action}d` : `Activity cannot be ${action}d in its current state`,
      activity: sim.activities.getActivity(id) ?? null,
    });
    return true;
  }

  // GET /api/observers
  if (req.method === 'GET' && url.pathname === '/api/observers') {
    sendJson(res, 200, { observers: sim.detection.listObservers() });
    return true;
  }

  // PUT /api/observers/:id: Register or replace an observer
  const observerPath = url.pathname.match(/^\/api\/observers\/([^/]+)$/);
  if (req.method === 'PUT' && observerPath) {
    const id = decodeURIComponent(observerPath[1]);
    readJson<ObserverBody>(req, res, (data) => handleObserverPut(res, sim, id, data));
    return true;
  }

  // DELETE /api/observers/:id
  if (req.method === 'DELETE' && observerPath) {
    const id = decodeURIComponent(observerPath[1]);
    if (!sim.detection.unregisterObserver(id)) {
      sendJson(res, 404, { error: 'Observer not found' });
    } else {
      sendJson(res, 200, { success: true, message: `Observer ${id} removed` });
    }
    return true;
  }

  // POST /api/pose: Where an actor is standing
  if (req.method === 'POST' && url.pathname === '/api/pose') {
    readJson<PoseBody>(req, res, (data) => {
      if (!isVec3(data.position)) {
        sendJson(res, 400, { error: 'position must be {x, y, z}' });
        return;
      }
      if (typeof data.location !== 'string' || !data.location) {
        sendJson(res, 400, { error: 'location is required' });
        return;
      }
      const actorId = typeof data.actor_id === 'string' && data.actor_id ? data.actor_id : sim.actorId;
      sim.detection.setActorPose(actorId, data.position, data.location);
      sendJson(res, 200, { actor_id: actorId, pose: sim.detection.getActorPose(actorId) ?? null });
    });
    return true;
  }

  // GET /api/risk?risk_tag=&location=&actor_id=
  if (req.method === 'GET' && url.pathname === '/api/risk') {
    const riskTag = url.searchParams.get('risk_tag');
    if (!riskTag) {
      sendJson(res, 400, { error: 'risk_tag is required' });
      return true;
    }
    const actorId = url.searchParams.get('actor_id') || sim.actorId;
    const location = url.searchParams.get('location') ?? sim.detection.getActorPose(actorId)?.locationId;
    if (!location) {
      sendJson(res, 404, { error: `No pose for actor ${actorId}` });
      return true;
    }
    const risk = sim.detection.getDetectionRisk(actorId, riskTag, location);
    sim.signals.flush();
    sendJson(res, 200, { actor_id: actorId, risk_tag: riskTag, location, risk, profile: sim.detection.getRiskProfile(riskTag) });
    return true;
  }

  // GET /api/events?limit=&type=: Signal log
  if (req.method === 'GET' && url.pathname === '/api/events') {
    const limitParam = parseInt(url.searchParams.get('limit') || '50', 10);
    const limit = Number.isFinite(limitParam) ? Math.min(Math.max(limitParam, 1), 500) : 50;
    const type = url.searchParams.get('type') || undefined;
    const events = getRecentEvents(limit, type).map(row => ({
      id: row.id,
      timestamp: row.timestamp,
      game_time: row.game_time,
      type: row.type,
      actor_id: row.actor_id,
      data: JSON.parse(row.data_json),
    }));
    sendJson(res, 200, { events });
    return true;
  }

  return false;
}

function heatView(sim: Simulation) {
  return {
    actor_id: sim.actorId,
    level: sim.heat.getLevel(),
    sources: sim.heat.getSources(),
    investigations: sim.heat.getInvestigations(),
    modifiers: sim.heat.getModifiers(),
    dials: sim.detection.getDials(),
  };
}

function handleObserverPut(res: ServerResponse, sim: Simulation, id: string, data: ObserverBody): void {
  if (!isOneOf(OBSERVER_ROLES, data.role)) {
    sendJson(res, 400, { error: `role must be one of ${OBSERVER_ROLES.join(', ')}` });
    return;
  }
  if (!isVec3(data.position)) {
    sendJson(res, 400, { error: 'position must be {x, y, z}' });
    return;
  }
  if (typeof data.location !== 'string' || !data.location) {
    sendJson(res, 400, { error: 'location is required' });
    return;
  }

  const observer = observerFromPreset(data.role, {
    position: data.position,
    facing: isVec3(data.facing) ? data.facing : { x: 0, y: 0, z: 1 },
    currentLocation: data.location,
  });
  if (typeof data.vision_range === 'number') observer.visionRange = data.vision_range;
  if (typeof data.vision_cone_degrees === 'number') observer.visionConeDegrees = data.vision_cone_degrees;
  if (typeof data.cares_about_legality === 'boolean') observer.caresAboutLegality = data.cares_about_legality;
  if (typeof data.cares_about_job_performance === 'boolean') observer.caresAboutJobPerformance = data.cares_about_job_performance;

  if (!sim.detection.registerObserver(id, observer)) {
    sendJson(res, 400, { error: 'Observer data rejected' });
    return;
  }

  if (data.patrol) {
    const waypoints = (data.patrol.waypoints ?? []).filter(isVec3);
    const interval = data.patrol.interval_seconds ?? 0;
    if (!sim.detection.setPatrolRoute(id, waypoints, interval)) {
      sendJson(res, 400, { error: 'patrol needs waypoints and a positive interval_seconds' });
      return;
    }
  }

  sendJson(res, 200, { success: true, observer: sim.detection.getObserver(id) ?? null });
}
