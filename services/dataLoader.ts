import { z } from 'zod';
import { DishRecord, IngredientRecord, InsightTables } from '../types';
import { InsightDataError, isInsightDataError } from './errors';

const CURRENCY_PATTERN = /₹(\d+)/;
const WASTE_SEPARATOR = ' - ';
const INGREDIENT_SEPARATOR = ', ';
const DECIMAL_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)$/;

// CSV cells arrive as strings, Supabase columns may already be numbers
const numericCell = z.union([
  z.number(),
  z.string().trim().regex(DECIMAL_PATTERN, 'Expected a number').transform(Number),
]);

const rawDishSchema = z.object({
  'Dish Name': z.string().min(1),
  'Weekly Orders': numericCell.pipe(z.number().int().nonnegative()),
  'Ingredients': z.string(),
  'Ingredient Cost': z.string(),
  'Profit Margin': z.string(),
  'Ingredient Waste': z.string(),
});

const rawIngredientSchema = z.object({
  'Ingredient': z.string().min(1),
  'Avg Waste %': numericCell,
  'Frequently Wasted In': z.string(),
  'Suggested Action': z.string(),
});

export const parseCurrency = (raw: string): number => {
  const m = raw.match(CURRENCY_PATTERN);
  if (!m) {
    throw new InsightDataError('MalformedCurrency', `Expected a ₹ amount, got "${raw}"`);
  }
  return parseInt(m[1], 10);
};

export const parseWasteField = (raw: string): { primaryWasteIngredient: string; wastePercentage: number } => {
  const sepIndex = raw.indexOf(WASTE_SEPARATOR);
  if (sepIndex < 0) {
    throw new InsightDataError('MalformedWasteField', `Expected "<ingredient> - <percent>%", got "${raw}"`);
  }

  const primaryWasteIngredient = raw.slice(0, sepIndex);
  const rest = raw.slice(sepIndex + WASTE_SEPARATOR.length).trim();
  const numeric = rest.endsWith('%') ? rest.slice(0, -1).trim() : '';
  if (!DECIMAL_PATTERN.test(numeric)) {
    throw new InsightDataError('MalformedPercentage', `Expected a percentage like "35%", got "${rest}"`);
  }

  return { primaryWasteIngredient, wastePercentage: parseFloat(numeric) };
};

export const parseIngredientList = (raw: string): string[] =>
  raw === '' ? [] : raw.split(INGREDIENT_SEPARATOR);

export const computeProfitMarginPercent = (profitMargin: number, ingredientCost: number): number => {
  if (ingredientCost === 0) {
    throw new InsightDataError('DivisionByZero', 'Ingredient cost is 0, profit margin % is undefined');
  }
  return (profitMargin / ingredientCost) * 100;
};

const describeIssues = (error: z.ZodError): string =>
  error.issues.map(issue => `${issue.path.join('.') || 'row'}: ${issue.message}`).join('; ');

const validateRow = <T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> => {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InsightDataError('InvalidRow', describeIssues(result.error), { cause: result.error });
  }
  return result.data;
};

export const normalizeDish = (raw: unknown): DishRecord => {
  const row = validateRow(rawDishSchema, raw);

  const ingredientCost = parseCurrency(row['Ingredient Cost']);
  const profitMargin = parseCurrency(row['Profit Margin']);
  const waste = parseWasteField(row['Ingredient Waste']);

  return {
    name: row['Dish Name'],
    weeklyOrders: row['Weekly Orders'],
    ingredientCost,
    profitMargin,
    profitMarginPercent: computeProfitMarginPercent(profitMargin, ingredientCost),
    ingredients: parseIngredientList(row['Ingredients']),
    ingredientWasteRaw: row['Ingredient Waste'],
    primaryWasteIngredient: waste.primaryWasteIngredient,
    wastePercentage: waste.wastePercentage,
  };
};

export const normalizeIngredient = (raw: unknown): IngredientRecord => {
  const row = validateRow(rawIngredientSchema, raw);
  return {
    ingredient: row['Ingredient'],
    avgWastePercent: row['Avg Waste %'],
    frequentlyWastedIn: row['Frequently Wasted In'],
    suggestedAction: row['Suggested Action'],
  };
};

const normalizeAll = <T>(table: string, rows: unknown[], normalize: (raw: unknown) => T): T[] =>
  rows.map((raw, idx) => {
    try {
      return normalize(raw);
    } catch (e) {
      if (!isInsightDataError(e)) throw e;
      const row = idx + 1;
      throw new InsightDataError(e.kind, `${table} row ${row}: ${e.message}`, { table, row, cause: e });
    }
  });

// Any bad row fails the whole load
export const normalizeTables = (rawDishes: unknown[], rawIngredients: unknown[]): InsightTables => {
  const dishes = normalizeAll('dish_sales', rawDishes, normalizeDish);
  const ingredients = normalizeAll('ingredient_waste', rawIngredients, normalizeIngredient);
  console.log(`[Loader] Normalized ${dishes.length} dishes, ${ingredients.length} ingredients`);
  return { dishes, ingredients };
};
