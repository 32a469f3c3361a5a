import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('defaults to the bundled CSV files', () => {
    expect(loadConfig({}, '/srv/kitchen')).toEqual({
      dataSource: 'csv',
      dishSalesPath: '/srv/kitchen/data/dish_sales.csv',
      ingredientWastePath: '/srv/kitchen/data/ingredient_waste.csv',
      supabase: {
        url: undefined,
        anonKey: undefined,
        dishTable: 'dish_sales',
        ingredientTable: 'ingredient_waste',
      },
    });
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ DATA_SOURCE: '', SUPABASE_URL: '  ' }, '/srv/kitchen');
    expect(config.dataSource).toBe('csv');
    expect(config.supabase.url).toBeUndefined();
  });

  it('reads Supabase settings', () => {
    const config = loadConfig(
      {
        DATA_SOURCE: 'supabase',
        SUPABASE_URL: 'https://example.supabase.co',
        SUPABASE_ANON_KEY: 'test-anon-key',
        DISH_SALES_CSV: '/data/dishes.csv',
      },
      '/srv/kitchen',
    );
    expect(config.dataSource).toBe('supabase');
    expect(config.dishSalesPath).toBe('/data/dishes.csv');
    expect(config.supabase.url).toBe('https://example.supabase.co');
    expect(config.supabase.anonKey).toBe('test-anon-key');
  });

  it('rejects unknown sources and malformed URLs', () => {
    expect(() => loadConfig({ DATA_SOURCE: 'mysql' })).toThrow(/^Invalid configuration: DATA_SOURCE/);
    expect(() => loadConfig({ SUPABASE_URL: 'not a url' })).toThrow('Invalid configuration: SUPABASE_URL: Not a valid URL');
  });
});
