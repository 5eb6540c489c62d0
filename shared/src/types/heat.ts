export type InvestigationType = 'surveillance' | 'audit' | 'raid' | 'arrest_warrant';

export interface HeatModifier {
  source: string;
  /** Heat per game hour; negative values cool the actor down */
  amount: number;
  /** Game seconds; null = permanent */
  expiresAt: number | null;
}

export interface AuditState {
  active: boolean;
  frozenAmount: number;
  resolvesAt: number | null;
}

export interface InvestigationState {
  surveillanceActive: boolean;
  warrantActive: boolean;
  audit: AuditState;
}

export interface HeatSnapshot {
  actorId: string;
  level: number;
  sources: Record<string, number>;
  lastIncreaseAt: number;
  activeModifiers: HeatModifier[];
  investigations: InvestigationState;
}

export type IncomeSource =
  | 'Salary'
  | 'Investment'
  | 'BusinessProfit'
  | 'Gambling'
  | 'Gift'
  | 'DrugSale'
  | 'Theft'
  | 'SexWork'
  | 'Other';
