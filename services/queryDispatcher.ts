import {
  DishRecord,
  IngredientRecord,
  InsightResponse,
  InsightTables,
  QueryIntent,
  RankedDish,
  TableCell,
  TableColumn,
  TableContent,
} from '../types';
import { getHighMarginOverlap, getHighWasteIngredients, getLowPerformers, suggestNewDishes } from './insightEngine';

export const UNRECOGNIZED_MESSAGE = "I'm sorry, I didn't understand that question. Please try rephrasing.";

interface QueryRoute {
  intent: Exclude<QueryIntent, 'Unrecognized'>;
  matches: (query: string) => boolean;
  handle: (tables: InsightTables) => InsightResponse;
}

const projectTable = <T extends object, K extends keyof T & string>(
  rows: ReadonlyArray<T>,
  columns: TableColumn<K>[],
): TableContent => ({
  kind: 'table',
  columns,
  rows: rows.map(row => {
    const projected: Record<string, TableCell> = {};
    columns.forEach(({ key }) => {
      const value: unknown = row[key];
      projected[key] = Array.isArray(value) ? value.map(String) : typeof value === 'number' ? value : String(value);
    });
    return projected;
  }),
});

export const formatSuggestions = (suggestions: Map<string, string[]>): string =>
  Array.from(suggestions, ([ingredient, actions]) => `**${ingredient}**:\n- ` + actions.join('\n- ')).join('\n\n');

// Charts get their own row objects, separate from the table content
const chartRows = (content: TableContent): Record<string, TableCell>[] => content.rows.map(row => ({ ...row }));

const contains = (needle: string) => (query: string) => query.includes(needle);

// Priority order matters: the first matching route answers the query
export const QUERY_ROUTES: ReadonlyArray<QueryRoute> = [
  {
    intent: 'RemovalCandidates',
    matches: contains('remove'),
    handle: ({ dishes }) => {
      const content = projectTable<DishRecord, 'name' | 'weeklyOrders' | 'primaryWasteIngredient' | 'wastePercentage'>(
        getLowPerformers(dishes),
        [
          { key: 'name', label: 'Dish Name' },
          { key: 'weeklyOrders', label: 'Weekly Orders' },
          { key: 'primaryWasteIngredient', label: 'Primary Waste Ingredient' },
          { key: 'wastePercentage', label: 'Waste Percentage' },
        ],
      );
      return {
        intent: 'RemovalCandidates',
        title: 'Dishes to Consider Removing/Repurposing',
        content,
        chart: { type: 'bar', data: chartRows(content), x: 'name', y: 'wastePercentage' },
      };
    },
  },
  {
    intent: 'TopWaste',
    matches: contains('wasted'),
    handle: ({ ingredients }) => {
      const content = projectTable<IngredientRecord, 'ingredient' | 'avgWastePercent' | 'frequentlyWastedIn'>(
        getHighWasteIngredients(ingredients),
        [
          { key: 'ingredient', label: 'Ingredient' },
          { key: 'avgWastePercent', label: 'Avg Waste %' },
          { key: 'frequentlyWastedIn', label: 'Frequently Wasted In' },
        ],
      );
      return {
        intent: 'TopWaste',
        title: 'Most Wasted Ingredients',
        content,
        chart: { type: 'pie', data: chartRows(content), category: 'ingredient', value: 'avgWastePercent' },
      };
    },
  },
  {
    intent: 'Suggestions',
    matches: contains('new dishes'),
    handle: ({ ingredients }) => ({
      intent: 'Suggestions',
      title: 'Suggested Waste Reduction Actions',
      content: { kind: 'text', text: formatSuggestions(suggestNewDishes(ingredients)) },
      chart: null,
    }),
  },
  {
    intent: 'OverlapRanking',
    matches: contains('overlapping'),
    handle: ({ dishes }) => {
      const ranked = getHighMarginOverlap(dishes);
      const content = projectTable<RankedDish, 'name' | 'profitMargin' | 'ingredients'>(ranked, [
        { key: 'name', label: 'Dish Name' },
        { key: 'profitMargin', label: 'Profit Margin' },
        { key: 'ingredients', label: 'Ingredients' },
      ]);
      // Scatter needs fields the table does not show
      const data = ranked.map(dish => ({
        name: dish.name,
        profitMargin: dish.profitMargin,
        weeklyOrders: dish.weeklyOrders,
        overlapScore: dish.overlapScore,
      }));
      return {
        intent: 'OverlapRanking',
        title: 'High Margin Dishes with Ingredient Overlap',
        content,
        chart: { type: 'scatter', data, x: 'profitMargin', y: 'weeklyOrders', size: 'overlapScore', color: 'name' },
      };
    },
  },
];

const findRoute = (queryText: string): QueryRoute | undefined => {
  const query = queryText.trim().toLowerCase();
  // Blank queries fall through to the apology
  if (!query) return undefined;
  return QUERY_ROUTES.find(route => route.matches(query));
};

export const resolveIntent = (queryText: string): QueryIntent => findRoute(queryText)?.intent ?? 'Unrecognized';

export const handleQuery = (queryText: string, tables: InsightTables): InsightResponse => {
  const route = findRoute(queryText);
  if (!route) {
    return {
      intent: 'Unrecognized',
      title: '',
      content: { kind: 'text', text: UNRECOGNIZED_MESSAGE },
      chart: null,
    };
  }
  return route.handle(tables);
};

export const handleQueryWithTables = (
  queryText: string,
  dishes: ReadonlyArray<DishRecord>,
  ingredients: ReadonlyArray<IngredientRecord>,
): InsightResponse => handleQuery(queryText, { dishes, ingredients });
