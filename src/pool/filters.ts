import type { StructuralFilters, SymbolData } from './types.js';

export interface FilterRejection {
  filter: string;
  reason: string;
}

type FilterCheck = (data: SymbolData, filters: StructuralFilters) => string | undefined;

/** Evaluated in this order; only the first failing filter is reported. */
const FILTER_CHECKS: ReadonlyArray<[string, FilterCheck]> = [
  [
    'exclude_state_owned_ratio_gte',
    (d, f) =>
      f.excludeStateOwnedRatioGte !== undefined && d.stateOwnedRatio >= f.excludeStateOwnedRatioGte
        ? `ratio ${d.stateOwnedRatio} >= ${f.excludeStateOwnedRatioGte}`
        : undefined,
  ],
  [
    'exclude_dividend_yield_gte',
    (d, f) =>
      f.excludeDividendYieldGte !== undefined && d.dividendYield >= f.excludeDividendYieldGte
        ? `yield ${d.dividendYield} >= ${f.excludeDividendYieldGte}`
        : undefined,
  ],
  [
    'min_avg_dollar_volume',
    (d, f) =>
      f.minAvgDollarVolume !== undefined && d.avgDollarVolume < f.minAvgDollarVolume
        ? `volume ${d.avgDollarVolume} < ${f.minAvgDollarVolume}`
        : undefined,
  ],
  [
    'exclude_sectors',
    (d, f) => (f.excludeSectors.includes(d.sector) ? `sector '${d.sector}' in exclusion list` : undefined),
  ],
  [
    'min_market_cap',
    (d, f) =>
      f.minMarketCap !== undefined && d.marketCap < f.minMarketCap
        ? `market_cap ${d.marketCap} < ${f.minMarketCap}`
        : undefined,
  ],
  [
    'min_price',
    (d, f) => (f.minPrice !== undefined && d.price < f.minPrice ? `price ${d.price} < ${f.minPrice}` : undefined),
  ],
  [
    'max_price',
    (d, f) => (f.maxPrice !== undefined && d.price > f.maxPrice ? `price ${d.price} > ${f.maxPrice}` : undefined),
  ],
];

export function checkStructuralFilters(
  data: SymbolData,
  filters: StructuralFilters
): FilterRejection | undefined {
  for (const [filter, check] of FILTER_CHECKS) {
    const detail = check(data, filters);
    if (detail !== undefined) {
      return { filter, reason: `structural_filter:${filter} (${detail})` };
    }
  }
  return undefined;
}

export function applyStructuralFilters(
  universe: readonly SymbolData[],
  filters: StructuralFilters
): { passed: SymbolData[]; excluded: Array<{ data: SymbolData; rejection: FilterRejection }> } {
  const passed: SymbolData[] = [];
  const excluded: Array<{ data: SymbolData; rejection: FilterRejection }> = [];
  for (const data of universe) {
    const rejection = checkStructuralFilters(data, filters);
    if (rejection) excluded.push({ data, rejection });
    else passed.push(data);
  }
  return { passed, excluded };
}
