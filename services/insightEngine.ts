import { DishRecord, IngredientRecord, RankedDish } from '../types';

export const LOW_PERFORMER_MAX_ORDERS = 10;
export const LOW_PERFORMER_MIN_WASTE = 20;
export const HIGH_WASTE_RANK_COUNT = 3;

// Few orders and heavy waste: candidates for removal or repurposing
export const getLowPerformers = (dishes: ReadonlyArray<DishRecord>): DishRecord[] =>
  dishes.filter(dish => dish.weeklyOrders < LOW_PERFORMER_MAX_ORDERS && dish.wastePercentage > LOW_PERFORMER_MIN_WASTE);

export const getHighWasteIngredients = (
  ingredients: ReadonlyArray<IngredientRecord>,
  count: number = HIGH_WASTE_RANK_COUNT,
): IngredientRecord[] => {
  if (ingredients.length < count) {
    console.warn(`[Insights] EmptyTable: requested top ${count} waste ingredients, only ${ingredients.length} available`);
  }
  // Array.prototype.sort is stable, ties keep input order
  return [...ingredients].sort((a, b) => b.avgWastePercent - a.avgWastePercent).slice(0, count);
};

export const computeOverlapScore = (ingredients: ReadonlyArray<string>): number => new Set(ingredients).size;

export const getHighMarginOverlap = (dishes: ReadonlyArray<DishRecord>): RankedDish[] => {
  const ranked: RankedDish[] = dishes.map(dish => ({
    ...dish,
    ingredients: [...dish.ingredients],
    overlapScore: computeOverlapScore(dish.ingredients),
  }));

  return ranked.sort((a, b) => b.profitMargin - a.profitMargin || b.overlapScore - a.overlapScore);
};

export const splitSuggestedActions = (suggestedAction: string): string[] =>
  suggestedAction.split('; ').map(s => s.trim());

export const suggestNewDishes = (ingredients: ReadonlyArray<IngredientRecord>): Map<string, string[]> => {
  const suggestions = new Map<string, string[]>();

  ingredients.forEach(row => {
    if (suggestions.has(row.ingredient)) {
      // Last row wins; the key keeps its first position
      console.warn(`[Insights] Duplicate ingredient "${row.ingredient}" in suggestions, keeping the last row`);
    }
    suggestions.set(row.ingredient, splitSuggestedActions(row.suggestedAction));
  });

  return suggestions;
};
