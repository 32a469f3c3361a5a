import { format, isAfter, isValid, parseISO, startOfDay } from 'date-fns';
import { AnalysisPeriod, DishRecord, IngredientRecord, InsightContext, InsightTables } from '../types';
import { InsightConfig } from './config';
import { normalizeTables } from './dataLoader';
import { InsightDataError } from './errors';
import { createSupabaseClient, createSupabaseRowFetcher, RowFetcher } from './supabaseClient';
import { loadRawTablesFromCsv, loadRawTablesFromSupabase } from './wasteStorage';

const toDay = (value: Date | string, label: string): Date => {
  const date = typeof value === 'string' ? parseISO(value) : value;
  if (!isValid(date)) {
    throw new InsightDataError('InvalidPeriod', `Analysis period ${label} "${String(value)}" is not a valid date`);
  }
  return startOfDay(date);
};

export const createAnalysisPeriod = (start: Date | string = new Date(), end: Date | string = start): AnalysisPeriod => {
  const period = { start: toDay(start, 'start'), end: toDay(end, 'end') };
  if (isAfter(period.start, period.end)) {
    throw new InsightDataError(
      'InvalidPeriod',
      `Analysis period starts ${format(period.start, 'yyyy-MM-dd')} after it ends ${format(period.end, 'yyyy-MM-dd')}`,
    );
  }
  return period;
};

export const formatAnalysisPeriod = ({ start, end }: AnalysisPeriod): string => {
  const from = format(start, 'MMM d, yyyy');
  const to = format(end, 'MMM d, yyyy');
  return from === to ? from : `${from} to ${to}`;
};

const freezeDish = (dish: DishRecord): DishRecord =>
  Object.freeze({ ...dish, ingredients: Object.freeze([...dish.ingredients]) });

export const createInsightContext = (tables: InsightTables, period: AnalysisPeriod = createAnalysisPeriod()): InsightContext =>
  Object.freeze({
    dishes: Object.freeze(tables.dishes.map(freezeDish)),
    ingredients: Object.freeze(tables.ingredients.map((row): IngredientRecord => Object.freeze({ ...row }))),
    period,
    loadedAt: new Date(),
  });

export const loadInsightContext = (config: InsightConfig, period?: AnalysisPeriod): InsightContext => {
  const raw = loadRawTablesFromCsv(config);
  return createInsightContext(normalizeTables(raw.dishes, raw.ingredients), period);
};

export const loadInsightContextFromSupabase = async (
  config: InsightConfig,
  period?: AnalysisPeriod,
  fetchRows?: RowFetcher,
): Promise<InsightContext> => {
  let fetcher = fetchRows;
  if (!fetcher) {
    const client = createSupabaseClient(config);
    if (!client) {
      throw new InsightDataError('SourceUnavailable', 'DATA_SOURCE is supabase but SUPABASE_URL / SUPABASE_ANON_KEY are not set');
    }
    fetcher = createSupabaseRowFetcher(client);
  }

  const raw = await loadRawTablesFromSupabase(fetcher, config);
  return createInsightContext(normalizeTables(raw.dishes, raw.ingredients), period);
};

export const loadInsightContextFromConfig = async (config: InsightConfig, period?: AnalysisPeriod): Promise<InsightContext> =>
  config.dataSource === 'supabase' ? loadInsightContextFromSupabase(config, period) : loadInsightContext(config, period);

// Re-reads both sources and keeps the current analysis period
export const reloadInsightContext = (previous: InsightContext, config: InsightConfig): Promise<InsightContext> =>
  loadInsightContextFromConfig(config, previous.period);
