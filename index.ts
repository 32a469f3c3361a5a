export * from './types';
export { InsightDataError, isInsightDataError } from './services/errors';
export type { InsightErrorKind } from './services/errors';
export { loadConfig } from './services/config';
export type { InsightConfig } from './services/config';
export { parseCsv, toObjects } from './services/csv';
export {
  parseCurrency,
  parseWasteField,
  parseIngredientList,
  computeProfitMarginPercent,
  normalizeDish,
  normalizeIngredient,
  normalizeTables,
} from './services/dataLoader';
export {
  getLowPerformers,
  getHighWasteIngredients,
  getHighMarginOverlap,
  computeOverlapScore,
  suggestNewDishes,
} from './services/insightEngine';
export { handleQuery, handleQueryWithTables, resolveIntent, formatSuggestions, UNRECOGNIZED_MESSAGE } from './services/queryDispatcher';
export {
  createAnalysisPeriod,
  formatAnalysisPeriod,
  createInsightContext,
  loadInsightContext,
  loadInsightContextFromSupabase,
  loadInsightContextFromConfig,
  reloadInsightContext,
} from './services/insightContext';
export { buildDashboard } from './services/dashboardService';
export { createSupabaseClient, createSupabaseRowFetcher } from './services/supabaseClient';
export type { RowFetcher } from './services/supabaseClient';
