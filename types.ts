
// Type aliases so rows stay assignable to Record<string, unknown>
export type RawDishRow = {
  'Dish Name': string;
  'Weekly Orders': string | number;
  'Ingredients': string;
  'Ingredient Cost': string;
  'Profit Margin': string;
  'Ingredient Waste': string;
};

export type RawIngredientRow = {
  'Ingredient': string;
  'Avg Waste %': string | number;
  'Frequently Wasted In': string;
  'Suggested Action': string;
};

export interface DishRecord {
  name: string;
  weeklyOrders: number;
  ingredientCost: number;
  profitMargin: number;
  profitMarginPercent: number;
  ingredients: ReadonlyArray<string>;
  ingredientWasteRaw: string;
  primaryWasteIngredient: string;
  wastePercentage: number;
}

export interface IngredientRecord {
  ingredient: string;
  avgWastePercent: number;
  frequentlyWastedIn: string;
  suggestedAction: string;
}

export interface RankedDish extends DishRecord {
  overlapScore: number; // Distinct ingredient names, computed per call
}

export interface InsightTables {
  dishes: ReadonlyArray<DishRecord>;
  ingredients: ReadonlyArray<IngredientRecord>;
}

export interface AnalysisPeriod {
  start: Date;
  end: Date;
}

export interface InsightContext extends InsightTables {
  period: AnalysisPeriod;
  loadedAt: Date;
}

export type TableCell = string | number | string[];

export interface TableColumn<K extends string = string> {
  key: K;
  label: string;
}

export interface TableContent {
  kind: 'table';
  columns: TableColumn[];
  rows: Record<string, TableCell>[];
}

export interface TextContent {
  kind: 'text';
  text: string;
}

export type ResponseContent = TableContent | TextContent;

export type ChartSpec =
  | { type: 'bar'; data: Record<string, TableCell>[]; x: string; y: string }
  | { type: 'pie'; data: Record<string, TableCell>[]; category: string; value: string }
  | { type: 'scatter'; data: Record<string, TableCell>[]; x: string; y: string; size: string; color: string }
  | { type: 'line'; data: Record<string, TableCell>[]; x: string; series: string[] };

export type QueryIntent = 'RemovalCandidates' | 'TopWaste' | 'Suggestions' | 'OverlapRanking' | 'Unrecognized';

export interface InsightResponse {
  intent: QueryIntent;
  title: string;
  content: ResponseContent;
  chart: ChartSpec | null;
}

export interface HighestWasteIngredient {
  ingredient: string;
  avgWastePercent: number;
  label: string;
}

export interface DashboardSummary {
  totalWeeklyOrders: number;
  highestWasteIngredient: HighestWasteIngredient | null;
  dishesNeedingAttention: number;
  periodLabel: string;
  charts: {
    ingredientWaste: ChartSpec;
    dishPerformance: ChartSpec;
  };
}
