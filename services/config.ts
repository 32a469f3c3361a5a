import path from 'path';
import { z } from 'zod';
import { InsightDataError } from './errors';

const isValidUrl = (s: string): boolean => {
  try {
    new URL(s);
    return true;
  } catch {
    return false;
  }
};

const emptyToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const envSchema = z.object({
  DATA_SOURCE: z.preprocess(emptyToUndefined, z.enum(['csv', 'supabase']).default('csv')),
  DISH_SALES_CSV: z.preprocess(emptyToUndefined, z.string().default('data/dish_sales.csv')),
  INGREDIENT_WASTE_CSV: z.preprocess(emptyToUndefined, z.string().default('data/ingredient_waste.csv')),
  SUPABASE_URL: z.preprocess(emptyToUndefined, z.string().refine(isValidUrl, 'Not a valid URL').optional()),
  SUPABASE_ANON_KEY: z.preprocess(emptyToUndefined, z.string().optional()),
  SUPABASE_DISH_TABLE: z.preprocess(emptyToUndefined, z.string().default('dish_sales')),
  SUPABASE_INGREDIENT_TABLE: z.preprocess(emptyToUndefined, z.string().default('ingredient_waste')),
});

export interface InsightConfig {
  dataSource: 'csv' | 'supabase';
  dishSalesPath: string;
  ingredientWastePath: string;
  supabase: {
    url?: string;
    anonKey?: string;
    dishTable: string;
    ingredientTable: string;
  };
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): InsightConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new InsightDataError('InvalidConfig', `Invalid configuration: ${detail}`, { cause: parsed.error });
  }

  const e = parsed.data;
  return {
    dataSource: e.DATA_SOURCE,
    dishSalesPath: path.resolve(cwd, e.DISH_SALES_CSV),
    ingredientWastePath: path.resolve(cwd, e.INGREDIENT_WASTE_CSV),
    supabase: {
      url: e.SUPABASE_URL,
      anonKey: e.SUPABASE_ANON_KEY,
      dishTable: e.SUPABASE_DISH_TABLE,
      ingredientTable: e.SUPABASE_INGREDIENT_TABLE,
    },
  };
};
