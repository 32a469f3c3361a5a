import { InsightTables } from '../../types';
import { normalizeTables } from '../dataLoader';
import { handleQuery, handleQueryWithTables, resolveIntent, UNRECOGNIZED_MESSAGE } from '../queryDispatcher';
import { rawDishes, rawIngredients } from './fixtures/tables';

let tables: InsightTables;

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  tables = normalizeTables(rawDishes, rawIngredients);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('resolveIntent', () => {
  it('matches case-insensitively in priority order', () => {
    expect(resolveIntent('Which dishes should I REMOVE?')).toBe('RemovalCandidates');
    expect(resolveIntent('I want the wasted ingredients report')).toBe('TopWaste');
    expect(resolveIntent('remove the most wasted dishes')).toBe('RemovalCandidates');
    expect(resolveIntent('ideas for new dishes with wasted stock')).toBe('TopWaste');
    expect(resolveIntent('Suggest new dishes')).toBe('Suggestions');
    expect(resolveIntent('show overlapping ingredients')).toBe('OverlapRanking');
  });

  it('falls through for blank or unknown queries', () => {
    expect(resolveIntent('')).toBe('Unrecognized');
    expect(resolveIntent('   ')).toBe('Unrecognized');
    expect(resolveIntent('what is the weather')).toBe('Unrecognized');
    expect(resolveIntent('newdishes')).toBe('Unrecognized');
  });
});

describe('handleQuery', () => {
  it('lists removal candidates with a bar chart', () => {
    const response = handleQuery('remove these dishes', tables);
    const rows = [{ name: 'Tomato Soup', weeklyOrders: 8, primaryWasteIngredient: 'Tomatoes', wastePercentage: 35 }];
    expect(response).toEqual({
      intent: 'RemovalCandidates',
      title: 'Dishes to Consider Removing/Repurposing',
      content: {
        kind: 'table',
        columns: [
          { key: 'name', label: 'Dish Name' },
          { key: 'weeklyOrders', label: 'Weekly Orders' },
          { key: 'primaryWasteIngredient', label: 'Primary Waste Ingredient' },
          { key: 'wastePercentage', label: 'Waste Percentage' },
        ],
        rows,
      },
      chart: { type: 'bar', data: rows, x: 'name', y: 'wastePercentage' },
    });
  });

  it('gives the chart its own copy of the table rows', () => {
    for (const query of ['remove', 'wasted']) {
      const response = handleQuery(query, tables);
      const { content, chart } = response;
      if (content.kind !== 'table' || !chart) throw new Error(`expected a table and chart for ${query}`);
      expect(chart.data).toEqual(content.rows);
      expect(chart.data).not.toBe(content.rows);
      chart.data.forEach((row, i) => expect(row).not.toBe(content.rows[i]));
    }
  });

  it('is idempotent for unchanged tables', () => {
    expect(handleQuery('remove these dishes', tables)).toEqual(handleQuery('remove these dishes', tables));
  });

  it('ranks the three most wasted ingredients with a pie chart', () => {
    const response = handleQuery('I want the wasted ingredients report', tables);
    expect(response.intent).toBe('TopWaste');
    expect(response.title).toBe('Most Wasted Ingredients');
    expect(response.content).toEqual({
      kind: 'table',
      columns: [
        { key: 'ingredient', label: 'Ingredient' },
        { key: 'avgWastePercent', label: 'Avg Waste %' },
        { key: 'frequentlyWastedIn', label: 'Frequently Wasted In' },
      ],
      rows: [
        { ingredient: 'Tomatoes', avgWastePercent: 35, frequentlyWastedIn: 'Tomato Soup, Dal Fry' },
        { ingredient: 'Cheese', avgWastePercent: 25, frequentlyWastedIn: 'Cheese Toast' },
        { ingredient: 'Garlic', avgWastePercent: 22.5, frequentlyWastedIn: 'Dal Fry' },
      ],
    });
    expect(response.chart).toMatchObject({ type: 'pie', category: 'ingredient', value: 'avgWastePercent' });
  });

  it('formats suggestions as markdown text without a chart', () => {
    const response = handleQuery('Any ideas for New Dishes?', tables);
    expect(response.intent).toBe('Suggestions');
    expect(response.title).toBe('Suggested Waste Reduction Actions');
    expect(response.chart).toBeNull();
    expect(response.content).toEqual({
      kind: 'text',
      text:
        '**Tomatoes**:\n- Use in soup\n- Freeze for later\n\n' +
        '**Cheese**:\n- Grate into toppings\n\n' +
        '**Lemon**:\n- Make lemon pickle\n- Juice for drinks\n\n' +
        '**Garlic**:\n- Confit in oil',
    });
  });

  it('ranks overlapping dishes by margin and plots a scatter', () => {
    const response = handleQuery('show overlapping ingredients', tables);
    expect(response.intent).toBe('OverlapRanking');
    expect(response.content).toEqual({
      kind: 'table',
      columns: [
        { key: 'name', label: 'Dish Name' },
        { key: 'profitMargin', label: 'Profit Margin' },
        { key: 'ingredients', label: 'Ingredients' },
      ],
      rows: [
        { name: 'Dal Fry', profitMargin: 100, ingredients: ['Lentils', 'Tomato', 'Garlic'] },
        { name: 'Tomato Soup', profitMargin: 100, ingredients: ['Tomato', 'Tomato', 'Cream'] },
        { name: 'Lemon Rice', profitMargin: 75, ingredients: ['Rice', 'Lemon'] },
        { name: 'Cheese Toast', profitMargin: 60, ingredients: ['Bread', 'Cheese'] },
      ],
    });
    expect(response.chart).toEqual({
      type: 'scatter',
      data: [
        { name: 'Dal Fry', profitMargin: 100, weeklyOrders: 20, overlapScore: 3 },
        { name: 'Tomato Soup', profitMargin: 100, weeklyOrders: 8, overlapScore: 2 },
        { name: 'Lemon Rice', profitMargin: 75, weeklyOrders: 8, overlapScore: 2 },
        { name: 'Cheese Toast', profitMargin: 60, weeklyOrders: 12, overlapScore: 2 },
      ],
      x: 'profitMargin',
      y: 'weeklyOrders',
      size: 'overlapScore',
      color: 'name',
    });
  });

  it('does not write the overlap score onto the shared table', () => {
    handleQuery('overlapping', tables);
    expect(tables.dishes.some(dish => 'overlapScore' in dish)).toBe(false);
  });

  it('apologises for empty and unknown queries', () => {
    const expected = {
      intent: 'Unrecognized',
      title: '',
      content: { kind: 'text', text: UNRECOGNIZED_MESSAGE },
      chart: null,
    };
    expect(handleQuery('', tables)).toEqual(expected);
    expect(handleQuery(' \t ', tables)).toEqual(expected);
    expect(handleQuery('how busy is friday', tables)).toEqual(expected);
    expect(UNRECOGNIZED_MESSAGE).toBe("I'm sorry, I didn't understand that question. Please try rephrasing.");
  });

  it('returns empty tables instead of failing', () => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const empty = { dishes: [], ingredients: [] };
    expect(handleQuery('remove', empty).content).toMatchObject({ kind: 'table', rows: [] });
    expect(handleQuery('wasted', empty).content).toMatchObject({ kind: 'table', rows: [] });
    expect(handleQuery('overlapping', empty).content).toMatchObject({ kind: 'table', rows: [] });
    expect(handleQuery('new dishes', empty).content).toEqual({ kind: 'text', text: '' });
  });
});

describe('handleQueryWithTables', () => {
  it('answers from separately held tables', () => {
    expect(handleQueryWithTables('remove', tables.dishes, tables.ingredients)).toEqual(handleQuery('remove', tables));
  });
});
