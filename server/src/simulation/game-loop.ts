import { SIM_TICK_RATE, STATUS_BROADCAST_RATE, TIME_SCALE, SAVE_INTERVAL_SEC } from '@hustle/shared';
import type { Simulation } from './simulation.js';

export interface GameLoopHooks {
  onStatusTick: (tick: number) => void;
  onSave?: () => void;
}

export class GameLoop {
  private running = false;
  private lastTime = 0;
  private simAccumulator = 0;
  private statusAccumulator = 0;
  private saveAccumulator = 0;
  private tick = 0;
  private timer: NodeJS.Immediate | null = null;

  private readonly SIM_STEP = 1000 / SIM_TICK_RATE;            // 100ms
  private readonly STATUS_STEP = 1000 / STATUS_BROADCAST_RATE; // 500ms

  constructor(
    private simulation: Simulation,
    private hooks: GameLoopHooks,
  ) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    this.lastTime = performance.now();
    console.log(`[GameLoop] Started — sim: ${SIM_TICK_RATE}Hz, status: ${STATUS_BROADCAST_RATE}Hz, time scale: ${TIME_SCALE}x`);
    this.loop();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearImmediate(this.timer);
      this.timer = null;
    }
    console.log('[GameLoop] Stopped');
  }

  private loop = (): void => {
    if (!this.running) return;

    const now = performance.now();
    const delta = now - this.lastTime;
    this.lastTime = now;

    // Cap delta to prevent spiral of death after long pauses
    const cappedDelta = Math.min(delta, 500);

    this.simAccumulator += cappedDelta;
    this.statusAccumulator += cappedDelta;
    this.saveAccumulator += cappedDelta;

    // Simulation steps (10 Hz real time, scaled to game seconds)
    while (this.simAccumulator >= this.SIM_STEP) {
      this.simulation.step((this.SIM_STEP / 1000) * TIME_SCALE);
      this.simAccumulator -= this.SIM_STEP;
    }

    while (this.statusAccumulator >= this.STATUS_STEP) {
      this.tick++;
      this.hooks.onStatusTick(this.tick);
      this.statusAccumulator -= this.STATUS_STEP;
    }

    if (this.saveAccumulator >= SAVE_INTERVAL_SEC * 1000) {
      this.saveAccumulator = 0;
      this.hooks.onSave?.();
    }

    // Yield to event loop, then continue
    this.timer = setImmediate(this.loop);
  };
}
