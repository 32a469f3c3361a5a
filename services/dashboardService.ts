import { DashboardSummary, HighestWasteIngredient, IngredientRecord, InsightContext } from '../types';
import { getHighWasteIngredients, getLowPerformers } from './insightEngine';
import { formatAnalysisPeriod } from './insightContext';

const describeHighestWaste = (ingredients: ReadonlyArray<IngredientRecord>): HighestWasteIngredient | null => {
  if (ingredients.length === 0) return null;
  const [top] = getHighWasteIngredients(ingredients, 1);
  return {
    ingredient: top.ingredient,
    avgWastePercent: top.avgWastePercent,
    label: `${top.ingredient} (${top.avgWastePercent}%)`,
  };
};

export const buildDashboard = (context: InsightContext): DashboardSummary => {
  const { dishes, ingredients } = context;

  const totalWeeklyOrders = dishes.reduce((sum, dish) => sum + dish.weeklyOrders, 0);

  return {
    totalWeeklyOrders,
    highestWasteIngredient: describeHighestWaste(ingredients),
    dishesNeedingAttention: getLowPerformers(dishes).length,
    periodLabel: formatAnalysisPeriod(context.period),
    charts: {
      ingredientWaste: {
        type: 'bar',
        data: ingredients.map(row => ({ ingredient: row.ingredient, avgWastePercent: row.avgWastePercent })),
        x: 'ingredient',
        y: 'avgWastePercent',
      },
      dishPerformance: {
        type: 'line',
        data: dishes.map(dish => ({
          name: dish.name,
          weeklyOrders: dish.weeklyOrders,
          wastePercentage: dish.wastePercentage,
        })),
        x: 'name',
        series: ['weeklyOrders', 'wastePercentage'],
      },
    },
  };
};
