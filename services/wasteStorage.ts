import fs from 'fs';
import { InsightConfig } from './config';
import { parseCsv, toObjects } from './csv';
import { InsightDataError } from './errors';
import { RowFetcher } from './supabaseClient';

export interface RawTables {
  dishes: Record<string, unknown>[];
  ingredients: Record<string, unknown>[];
}

export const readCsvTable = (filePath: string, table: string): Record<string, string>[] => {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (e) {
    throw new InsightDataError('SourceUnavailable', `Could not read ${table} from ${filePath}`, { table, cause: e });
  }

  const parsed = parseCsv(text, table);
  if (parsed.headers.length === 0) {
    throw new InsightDataError('EmptyTable', `${filePath} has no header row`, { table });
  }
  return toObjects(parsed);
};

export const loadRawTablesFromCsv = (config: InsightConfig): RawTables => {
  const dishes = readCsvTable(config.dishSalesPath, 'dish_sales');
  const ingredients = readCsvTable(config.ingredientWastePath, 'ingredient_waste');
  console.log(`[Loader] Read ${dishes.length} dish rows from ${config.dishSalesPath}`);
  console.log(`[Loader] Read ${ingredients.length} ingredient rows from ${config.ingredientWastePath}`);
  return { dishes, ingredients };
};

export const loadRawTablesFromSupabase = async (fetchRows: RowFetcher, config: InsightConfig): Promise<RawTables> => {
  const [dishes, ingredients] = await Promise.all([
    fetchRows(config.supabase.dishTable),
    fetchRows(config.supabase.ingredientTable),
  ]);
  console.log(`[Loader] Read ${dishes.length} dish rows, ${ingredients.length} ingredient rows from Supabase`);
  return { dishes, ingredients };
};
