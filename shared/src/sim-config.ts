/**
 * ╔══════════════════════════════════════════════════════════════════╗
 * ║                  SIMULATION CONFIGURATION                      ║
 * ║                                                                ║
 * ║  Single source of truth for the tunable parts of the hustle    ║
 * ║  loop: which activities are risky, how observers see, and      ║
 * ║  what the heat sources are called.                             ║
 * ╚══════════════════════════════════════════════════════════════════╝
 */

import type { ObserverData, ObserverRole, RiskProfile } from './types/perception.js';
import type { IncomeSource } from './types/heat.js';

// ── Observer presets ─────────────────────────────────────────────
// Vision and "what do I care about" defaults per role. Position,
// facing and location are filled in when an NPC is placed.

export type RolePreset = Omit<ObserverData, 'role' | 'position' | 'facing' | 'currentLocation'>;

export interface SimConfig {
  // ── Identity ──────────────────────────────────────────────────
  name: string;
  dbFilename: string;
  defaultActorId: string;

  // ── Risk catalog ──────────────────────────────────────────────
  // Unknown tags fall back to `defaultRisk`.
  riskCatalog: Record<string, RiskProfile>;
  defaultRisk: RiskProfile;

  // ── Observers ─────────────────────────────────────────────────
  rolePresets: Record<ObserverRole, RolePreset>;
  lawEnforcementRoles: ObserverRole[];
  authorityRoles: ObserverRole[];

  // ── Heat ──────────────────────────────────────────────────────
  heatSources: {
    flashyPurchase: string;
    cashDeposit: string;
    suspiciousIncome: string;
    unknown: string;
  };
  illegalIncomeSources: IncomeSource[];
  flaggedIncomeSources: IncomeSource[];

  // ── Messages ──────────────────────────────────────────────────
  messages: {
    serverBanner: string;
    thresholdCrossed: string;
    investigation: Record<string, string>;
    auditCleared: string;
    auditFined: string;
  };
}

export const SIM_CONFIG: SimConfig = {
  name: 'Hustle Heat',
  dbFilename: 'hustle.db',
  defaultActorId: 'player',

  riskCatalog: {
    office_work:     { isLegal: true,  visualProfile: 0.5, requiredAttention: 0.6, riskBearing: true },
    warehouse_work:  { isLegal: true,  visualProfile: 0.6, requiredAttention: 0.6, riskBearing: true },
    slacking:        { isLegal: true,  visualProfile: 0.7, requiredAttention: 0.2, riskBearing: true },
    livestream:      { isLegal: true,  visualProfile: 0.3, requiredAttention: 0.8 },
    phone_browsing:  { isLegal: true,  visualProfile: 0.2, requiredAttention: 0.3 },
    drug_dealing:    { isLegal: false, visualProfile: 0.8, requiredAttention: 0.5, riskBearing: true },
    shoplifting:     { isLegal: false, visualProfile: 0.6, requiredAttention: 0.7, riskBearing: true },
    money_laundering: { isLegal: false, visualProfile: 0,  requiredAttention: 0.4, riskBearing: true },
  },
  defaultRisk: { isLegal: true, visualProfile: 0.5 },

  rolePresets: {
    boss:     { visionRange: 10, visionConeDegrees: 110, audioSensitivity: 0.5, caresAboutLegality: false, caresAboutJobPerformance: true },
    cop:      { visionRange: 15, visionConeDegrees: 120, audioSensitivity: 0.6, caresAboutLegality: true,  caresAboutJobPerformance: false },
    coworker: { visionRange: 6,  visionConeDegrees: 140, audioSensitivity: 0.4, caresAboutLegality: false, caresAboutJobPerformance: true },
    security: { visionRange: 12, visionConeDegrees: 90,  audioSensitivity: 0.7, caresAboutLegality: true,  caresAboutJobPerformance: false },
    civilian: { visionRange: 8,  visionConeDegrees: 160, audioSensitivity: 0.3, caresAboutLegality: true,  caresAboutJobPerformance: false },
  },
  lawEnforcementRoles: ['cop'],
  authorityRoles: ['boss'],

  heatSources: {
    flashyPurchase: 'flashy_purchase',
    cashDeposit: 'cash_deposit',
    suspiciousIncome: 'suspicious_income',
    unknown: 'unknown',
  },
  illegalIncomeSources: ['DrugSale', 'Theft', 'SexWork'],
  flaggedIncomeSources: ['DrugSale', 'SexWork'],

  messages: {
    serverBanner: '=== {{name_upper}} SERVER ===',
    thresholdCrossed: 'Heat for {{actor}} crossed {{threshold}} (now {{level}})',
    investigation: {
      surveillance: 'Surveillance opened on {{actor}}: patrols and sensitivity raised',
      audit: 'Audit opened on {{actor}}: {{amount}} frozen until day {{day}}',
      raid: 'Raid on {{actor}}: heat halved to {{level}}',
      arrest_warrant: 'Arrest warrant issued for {{actor}}',
    },
    auditCleared: 'Audit on {{actor}} closed clean; funds released',
    auditFined: 'Audit on {{actor}} closed with a fine of {{fine}}',
  },
};

// ── Template rendering ──────────────────────────────────────────

/** Replace {{placeholders}} in a message template */
export function renderMessage(
  template: string,
  vars: Record<string, string | number> = {},
): string {
  const allVars: Record<string, string | number> = {
    name: SIM_CONFIG.name,
    name_upper: SIM_CONFIG.name.toUpperCase(),
    ...vars,
  };

  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => {
    const val = allVars[key];
    return val !== undefined ? String(val) : match;
  });
}

/** Risk profile for a tag, falling back to the catalog default */
export function getRiskProfile(riskTag: string): RiskProfile {
  return SIM_CONFIG.riskCatalog[riskTag] ?? SIM_CONFIG.defaultRisk;
}

/** Observer data from a role preset plus placement */
export function observerFromPreset(
  role: ObserverRole,
  placement: Pick<ObserverData, 'position' | 'facing' | 'currentLocation'>,
): ObserverData {
  return { role, ...SIM_CONFIG.rolePresets[role], ...placement };
}
