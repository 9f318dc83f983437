import { z } from 'zod';

import type { Constraint, ConstraintActions, ConstraintGuardrails } from '../constraints/types.js';
import type { Factor } from '../factors/types.js';
import { FACTOR_STATUSES, FAILURE_ACTIONS } from '../factors/types.js';
import type { Hypothesis } from '../hypothesis/types.js';
import type { PoolConfig, PoolGating, StructuralFilters, SymbolData } from '../pool/types.js';
import type { RegimeConfig } from '../regime/types.js';
import {
  CHECK_SCHEDULES,
  COMPARISON_OPERATORS,
  HYPOTHESIS_STATUSES,
  STOP_MODES,
  TRIGGER_ACTIONS,
} from './types.js';

export const HYPOTHESIS_FALSIFIER_GATE = 'gate:hypothesis_requires_falsifiers';
export const CONSTRAINT_ALLOWLIST_GATE = 'gate:constraint_actions_allowlist';
export const FACTOR_FAILURE_RULE_GATE = 'gate:factor_requires_failure_rule';

const idSchema = z.string().regex(/^[a-z0-9_]+$/, 'must match ^[a-z0-9_]+$');
const symbolSchema = z.string().regex(/^[A-Z0-9][A-Z0-9.\-]*$/, 'must be an upper-case ticker');
const windowSchema = z.string().regex(/^\d+[dwmqy]$/, 'must look like 90d, 6m, 4q or 1y');
const dateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a YYYY-MM-DD date');

const FalsifierSchema = z
  .object({
    metric: z.string().min(1),
    operator: z.enum(COMPARISON_OPERATORS),
    threshold: z.number().finite(),
    window: windowSchema,
    trigger: z.enum(TRIGGER_ACTIONS),
    schedule: z.enum(CHECK_SCHEDULES).optional(),
  })
  .strict();

export const HypothesisSchema = z
  .object({
    id: idSchema,
    title: z.string().min(1),
    statement: z.string().min(1),
    scope: z
      .object({
        symbols: z.array(symbolSchema).default([]),
        sectors: z.array(z.string().min(1)).default([]),
      })
      .strict()
      .default({}),
    owner: z.literal('human').default('human'),
    status: z.enum(HYPOTHESIS_STATUSES).default('DRAFT'),
    review_cycle: z.string().min(1),
    created_at: dateSchema,
    evidence: z
      .object({
        sources: z.array(z.string()).default([]),
        notes: z.string().default(''),
      })
      .strict()
      .default({}),
    falsifiers: z.array(FalsifierSchema).min(1, 'at least one falsifier is required'),
    linked_constraints: z.array(idSchema).default([]),
  })
  .strict()
  .transform(
    (raw): Hypothesis => ({
      id: raw.id,
      title: raw.title,
      statement: raw.statement,
      scope: raw.scope,
      owner: raw.owner,
      status: raw.status,
      reviewCycle: raw.review_cycle,
      createdAt: raw.created_at,
      evidence: raw.evidence,
      falsifiers: raw.falsifiers,
      linkedConstraints: raw.linked_constraints,
    })
  );

const ActionsSchema = z
  .object({
    enable_strategy: z.boolean().optional(),
    pool_bias_multiplier: z.number().positive().optional(),
    veto_downgrade: z.boolean().optional(),
    risk_budget_multiplier: z.number().positive().optional(),
    holding_extension_days: z.number().int().nonnegative().optional(),
    add_position_cap_multiplier: z.number().positive().optional(),
    stop_mode: z.enum(STOP_MODES).optional(),
  })
  .strict();

const GuardrailsSchema = z
  .object({
    max_position_pct: z.number().min(0).max(1).optional(),
    max_gross_exposure_delta: z.number().nonnegative().optional(),
    max_drawdown_addon: z.number().nonnegative().optional(),
  })
  .strict();

function toActions(raw: z.infer<typeof ActionsSchema>): ConstraintActions {
  const actions: ConstraintActions = {};
  if (raw.enable_strategy !== undefined) actions.enableStrategy = raw.enable_strategy;
  if (raw.pool_bias_multiplier !== undefined) actions.poolBiasMultiplier = raw.pool_bias_multiplier;
  if (raw.veto_downgrade !== undefined) actions.vetoDowngrade = raw.veto_downgrade;
  if (raw.risk_budget_multiplier !== undefined) actions.riskBudgetMultiplier = raw.risk_budget_multiplier;
  if (raw.holding_extension_days !== undefined) {
    actions.holdingExtensionDays = raw.holding_extension_days;
  }
  if (raw.add_position_cap_multiplier !== undefined) {
    actions.addPositionCapMultiplier = raw.add_position_cap_multiplier;
  }
  if (raw.stop_mode !== undefined) actions.stopMode = raw.stop_mode;
  return actions;
}

function toGuardrails(raw: z.infer<typeof GuardrailsSchema>): ConstraintGuardrails {
  const guardrails: ConstraintGuardrails = {};
  if (raw.max_position_pct !== undefined) guardrails.maxPositionPct = raw.max_position_pct;
  if (raw.max_gross_exposure_delta !== undefined) {
    guardrails.maxGrossExposureDelta = raw.max_gross_exposure_delta;
  }
  if (raw.max_drawdown_addon !== undefined) guardrails.maxDrawdownAddon = raw.max_drawdown_addon;
  return guardrails;
}

export const ConstraintSchema = z
  .object({
    id: idSchema,
    title: z.string().min(1),
    applies_to: z
      .object({
        symbols: z.array(symbolSchema).default([]),
        strategies: z.array(z.string().min(1)).default([]),
      })
      .strict()
      .default({}),
    activation: z
      .object({
        requires_hypotheses_active: z.array(idSchema).default([]),
        disabled_if_falsified: z.boolean().default(true),
      })
      .strict()
      .default({}),
    actions: ActionsSchema,
    guardrails: GuardrailsSchema.optional(),
    priority: z.number().int().min(1).default(100),
  })
  .strict()
  .transform((raw): Constraint => {
    const constraint: Constraint = {
      id: raw.id,
      title: raw.title,
      appliesTo: raw.applies_to,
      activation: {
        requiresHypothesesActive: raw.activation.requires_hypotheses_active,
        disabledIfFalsified: raw.activation.disabled_if_falsified,
      },
      actions: toActions(raw.actions),
      priority: raw.priority,
    };
    if (raw.guardrails) {
      constraint.guardrails = toGuardrails(raw.guardrails);
    }
    return constraint;
  });

const FailureRuleSchema = z
  .object({
    metric: z.string().min(1),
    operator: z.enum(COMPARISON_OPERATORS),
    threshold: z.number().finite(),
    window: windowSchema,
    action: z.enum(FAILURE_ACTIONS),
  })
  .strict();

export const FactorSchema = z
  .object({
    id: idSchema,
    name: z.string().min(1),
    description: z.string().default(''),
    inputs: z.array(z.string().min(1)).min(1),
    transform: z.string().min(1).optional(),
    ic: z
      .object({
        window: windowSchema,
        horizon_days: z.number().int().positive(),
        min_ic: z.number().finite(),
      })
      .strict()
      .optional(),
    hypothesis_ids: z.array(idSchema).default([]),
    failure_rules: z.array(FailureRuleSchema).min(1, 'at least one failure rule is required'),
    status: z.enum(FACTOR_STATUSES).default('ENABLED'),
  })
  .strict()
  .transform((raw): Factor => {
    const factor: Factor = {
      id: raw.id,
      name: raw.name,
      description: raw.description,
      inputs: raw.inputs,
      hypothesisIds: raw.hypothesis_ids,
      failureRules: raw.failure_rules,
      status: raw.status,
    };
    if (raw.transform !== undefined) factor.transform = raw.transform;
    if (raw.ic) {
      factor.ic = { window: raw.ic.window, horizonDays: raw.ic.horizon_days, minIc: raw.ic.min_ic };
    }
    return factor;
  });

const SymbolDataSchema = z
  .object({
    symbol: symbolSchema,
    sector: z.string().min(1),
    price: z.number().nonnegative(),
    market_cap: z.number().nonnegative(),
    avg_dollar_volume: z.number().nonnegative(),
    dividend_yield: z.number().nonnegative().default(0),
    state_owned_ratio: z.number().min(0).max(1).default(0),
  })
  .strict()
  .transform(
    (raw): SymbolData => ({
      symbol: raw.symbol,
      sector: raw.sector,
      price: raw.price,
      marketCap: raw.market_cap,
      avgDollarVolume: raw.avg_dollar_volume,
      dividendYield: raw.dividend_yield,
      stateOwnedRatio: raw.state_owned_ratio,
    })
  );

export const UniverseSchema = z.array(SymbolDataSchema).min(1, 'base universe must not be empty');

export const StructuralFiltersSchema = z
  .object({
    exclude_state_owned_ratio_gte: z.number().min(0).max(1).optional(),
    exclude_dividend_yield_gte: z.number().nonnegative().optional(),
    min_avg_dollar_volume: z.number().nonnegative().optional(),
    exclude_sectors: z.array(z.string().min(1)).default([]),
    min_market_cap: z.number().nonnegative().optional(),
    min_price: z.number().nonnegative().optional(),
    max_price: z.number().nonnegative().optional(),
  })
  .strict()
  .refine((raw) => raw.min_price === undefined || raw.max_price === undefined || raw.min_price <= raw.max_price, {
    message: 'min_price must not exceed max_price',
    path: ['min_price'],
  })
  .transform((raw): StructuralFilters => {
    const filters: StructuralFilters = { excludeSectors: raw.exclude_sectors };
    if (raw.exclude_state_owned_ratio_gte !== undefined) {
      filters.excludeStateOwnedRatioGte = raw.exclude_state_owned_ratio_gte;
    }
    if (raw.exclude_dividend_yield_gte !== undefined) {
      filters.excludeDividendYieldGte = raw.exclude_dividend_yield_gte;
    }
    if (raw.min_avg_dollar_volume !== undefined) filters.minAvgDollarVolume = raw.min_avg_dollar_volume;
    if (raw.min_market_cap !== undefined) filters.minMarketCap = raw.min_market_cap;
    if (raw.min_price !== undefined) filters.minPrice = raw.min_price;
    if (raw.max_price !== undefined) filters.maxPrice = raw.max_price;
    return filters;
  });

export const PoolGatingSchema = z
  .object({
    exclude: z.array(idSchema).default([]),
    include: z.array(idSchema).default([]),
    prioritize: z.array(idSchema).default([]),
    bias_multiplier: z.number().positive().default(1),
  })
  .strict()
  .transform(
    (raw): PoolGating => ({
      exclude: raw.exclude,
      include: raw.include,
      prioritize: raw.prioritize,
      biasMultiplier: raw.bias_multiplier,
    })
  );

export const PoolConfigSchema = z
  .object({
    universe: UniverseSchema,
    filters: StructuralFiltersSchema.default({}),
    gating: PoolGatingSchema.default({}),
  })
  .strict()
  .transform(
    (raw): PoolConfig => ({
      universe: raw.universe,
      filters: raw.filters,
      gating: raw.gating,
    })
  );

export const RegimeConfigSchema = z
  .object({
    thresholds: z
      .object({
        volatility_transition: z.number().nonnegative(),
        volatility_stress: z.number().nonnegative(),
        drawdown_transition: z.number().nonnegative(),
        drawdown_stress: z.number().nonnegative(),
        dispersion_transition: z.number().nonnegative().optional(),
        dispersion_stress: z.number().nonnegative().optional(),
      })
      .strict()
      .refine((t) => t.volatility_transition <= t.volatility_stress, {
        message: 'volatility_transition must not exceed volatility_stress',
        path: ['volatility_transition'],
      })
      .refine((t) => t.drawdown_transition <= t.drawdown_stress, {
        message: 'drawdown_transition must not exceed drawdown_stress',
        path: ['drawdown_transition'],
      }),
    pacing_multipliers: z
      .object({
        NORMAL: z.number().min(0).max(1).default(1),
        TRANSITION: z.number().min(0).max(1).default(0.5),
        STRESS: z.number().min(0).max(1).default(0.1),
      })
      .strict()
      .default({}),
  })
  .strict()
  .transform((raw): RegimeConfig => {
    const t = raw.thresholds;
    return {
      thresholds: {
        volatilityTransition: t.volatility_transition,
        volatilityStress: t.volatility_stress,
        drawdownTransition: t.drawdown_transition,
        drawdownStress: t.drawdown_stress,
        ...(t.dispersion_transition !== undefined ? { dispersionTransition: t.dispersion_transition } : {}),
        ...(t.dispersion_stress !== undefined ? { dispersionStress: t.dispersion_stress } : {}),
      },
      pacingMultipliers: raw.pacing_multipliers,
    };
  });
