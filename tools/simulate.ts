#!/usr/bin/env node

import { Command } from 'commander';
import { resolve } from 'path';
import { existsSync } from 'fs';
import type { SimSignal } from '@hustle/shared';
import { GAME_HOUR_SECONDS } from '@hustle/shared';
import { loadScenario, runScenario } from './scenario.js';

const program = new Command();

program
  .name('hustle-sim')
  .description('Headless runner for Hustle Heat scenarios')
  .version('0.1.0');

program
  .command('run')
  .description('Play a scenario and print its signal log')
  .requiredOption('-s, --scenario <path>', 'Path to scenario JSON')
  .option('--seed <n>', 'Seed for patrol jitter', (v) => parseInt(v, 10))
  .option('--hours <h>', 'Override the scenario length in game hours', parseFloat)
  .option('-q, --quiet', 'Only print the summary', false)
  .action((opts: { scenario: string; seed?: number; hours?: number; quiet: boolean }) => {
    try {
      const scenarioPath = resolve(opts.scenario);
      if (!existsSync(scenarioPath)) {
        console.error(`Scenario not found: ${scenarioPath}`);
        process.exit(1);
      }
      if (opts.hours !== undefined && !(opts.hours > 0)) {
        console.error('--hours must be a positive number');
        process.exit(1);
      }

      const scenario = loadScenario(scenarioPath);
      const run = runScenario(scenario, opts.seed, opts.hours);

      console.log(`Scenario: ${scenario.name}`);
      if (!opts.quiet) {
        for (const { game_time, signal } of run.signals) {
          if (signal.type === 'detection_risk' || signal.type === 'heat_decreased') continue;
          console.log(`  [${formatGameTime(game_time)}] ${describeSignal(signal)}`);
        }
      }

      const { final } = run;
      const sources = Object.entries(final.heat_sources)
        .map(([cause, amount]) => `${cause}=${amount.toFixed(1)}`)
        .join(', ');
      console.log('');
      console.log(`Game time: ${formatGameTime(final.game_time)}`);
      console.log(`Heat: ${final.heat.toFixed(1)}${sources ? ` (${sources})` : ''}`);
      console.log(`Dials: patrol ×${final.dials.patrolFrequencyMultiplier.toFixed(2)}, sensitivity ×${final.dials.detectionSensitivityMultiplier.toFixed(2)}`);
      console.log(`Surveillance: ${final.investigations.surveillanceActive ? 'yes' : 'no'}, warrant: ${final.investigations.warrantActive ? 'yes' : 'no'}, audit: ${final.investigations.audit.active ? 'open' : 'none'}`);
      console.log(`Balance: ${run.balance.toFixed(2)}`);
      console.log(`Signals: ${run.signals.length}`);
    } catch (err) {
      console.error('Scenario failed:', err instanceof Error ? err.message : err);
      process.exit(1);
    }
  });

function formatGameTime(seconds: number): string {
  const day = Math.floor(seconds / (24 * GAME_HOUR_SECONDS));
  const hour = Math.floor((seconds % (24 * GAME_HOUR_SECONDS)) / GAME_HOUR_SECONDS);
  const minute = Math.floor((seconds % GAME_HOUR_SECONDS) / 60);
  return `d${day} ${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

function describeSignal(signal: SimSignal): string {
  switch (signal.type) {
    case 'activity_started':
      return `started ${signal.riskTag} (${signal.kind}) for ${signal.ownerId}`;
    case 'activity_ended':
      return `ended ${signal.result.riskTag ?? signal.result.activityId}: score ${signal.result.performanceScore.toFixed(1)}${signal.result.wasDetected ? ', detected' : ''}`;
    case 'activity_caught':
      return `caught ${signal.riskTag} by ${signal.detection.observerId} (severity ${signal.detection.severity.toFixed(2)})`;
    case 'heat_increased':
      return `heat +${signal.amount.toFixed(1)} from ${signal.cause} → ${signal.level.toFixed(1)}`;
    case 'heat_threshold_crossed':
      return `heat crossed ${signal.threshold}`;
    case 'investigation_triggered':
      return `investigation: ${signal.investigation}`;
    case 'audit_resolved':
      return `audit ${signal.outcome}${signal.fine > 0 ? ` (fine ${signal.fine.toFixed(2)})` : ''}`;
    default:
      return signal.type;
  }
}

program.parse();
