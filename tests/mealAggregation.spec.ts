import { MealEntry } from '../src/domain/types';
import {
  EMPTY_ITEM_DEFAULTS,
  aggregateMeals,
  deriveItemDefaults,
  groupHistoryByDate,
  listItemNames,
  resolveItemName,
  sortHistory,
} from '../src/services/mealAggregation';
import { computeMealTotals } from '../src/services/nutritionScaling';

let nextId = 1;

function meal(overrides: Partial<MealEntry> = {}): MealEntry {
  const base = {
    id: nextId++,
    owner: 'alice',
    date: '2024-01-01',
    itemName: 'Rice',
    mealType: 'Other' as const,
    weightGrams: 100,
    servingSizeGrams: 100,
    caloriesPerServing: 130,
    proteinGramsPerServing: 2.7,
    ...overrides,
  };
  const totals = computeMealTotals(base);
  return {
    ...base,
    caloriesTotal: totals.caloriesTotal,
    proteinGramsTotal: totals.proteinGramsTotal,
    ...overrides,
  };
}

beforeEach(() => {
  nextId = 1;
});

describe('deriveItemDefaults', () => {
  it('returns (1, 0, 0) for an empty history', () => {
    expect(deriveItemDefaults([], 'alice', 'Rice')).toEqual({
      servingSizeGrams: 1,
      caloriesPerServing: 0,
      proteinGramsPerServing: 0,
    });
  });

  it('returns (1, 0, 0) for a blank item name', () => {
    expect(deriveItemDefaults([meal()], 'alice', '   ')).toEqual(EMPTY_ITEM_DEFAULTS);
  });

  it('returns (1, 0, 0) when no entry matches', () => {
    expect(deriveItemDefaults([meal({ itemName: 'Oats' })], 'alice', 'Rice')).toEqual(EMPTY_ITEM_DEFAULTS);
  });

  it.each([1, 37, 150, 333.3])('recovers the per-serving values entered, for weight %p', (weight) => {
    const history = [
      meal({ weightGrams: weight, servingSizeGrams: 40, caloriesPerServing: 123.4, proteinGramsPerServing: 7.9 }),
    ];
    const defaults = deriveItemDefaults(history, 'alice', 'Rice');
    expect(defaults.servingSizeGrams).toBe(40);
    expect(defaults.caloriesPerServing).toBeCloseTo(123.4, 9);
    expect(defaults.proteinGramsPerServing).toBeCloseTo(7.9, 9);
  });

  it('uses the entry with the highest id, not the latest date', () => {
    const older = meal({ id: 1, date: '2024-03-01', servingSizeGrams: 50, caloriesPerServing: 100, proteinGramsPerServing: 4 });
    const newer = meal({ id: 2, date: '2024-01-01', servingSizeGrams: 80, caloriesPerServing: 300, proteinGramsPerServing: 12 });

    const defaults = deriveItemDefaults([newer, older], 'alice', 'Rice');
    expect(defaults.servingSizeGrams).toBe(80);
    expect(defaults.caloriesPerServing).toBeCloseTo(300, 9);
    expect(defaults.proteinGramsPerServing).toBeCloseTo(12, 9);
  });

  it('matches names after trimming but case-sensitively', () => {
    const history = [meal({ id: 1, itemName: 'Rice' })];

    expect(deriveItemDefaults(history, 'alice', ' rice ')).toEqual(EMPTY_ITEM_DEFAULTS);

    const defaults = deriveItemDefaults(history, 'alice', '  Rice ');
    expect(defaults.servingSizeGrams).toBe(100);
    expect(defaults.caloriesPerServing).toBeCloseTo(130, 9);
    expect(defaults.proteinGramsPerServing).toBeCloseTo(2.7, 9);
  });

  it('matches stored names that carry stray whitespace', () => {
    const history = [meal({ itemName: ' Rice  ', servingSizeGrams: 25 })];
    expect(deriveItemDefaults(history, 'alice', 'Rice').servingSizeGrams).toBe(25);
  });

  it('skips entries with no weight or no serving size, and other users\' entries', () => {
    const history = [
      meal({ id: 1, servingSizeGrams: 60 }),
      meal({ id: 2, weightGrams: 0, servingSizeGrams: 70 }),
      meal({ id: 3, servingSizeGrams: 0, caloriesTotal: 0, proteinGramsTotal: 0 }),
      meal({ id: 4, owner: 'bob', servingSizeGrams: 90 }),
    ];
    expect(deriveItemDefaults(history, 'alice', 'Rice').servingSizeGrams).toBe(60);
  });
});

describe('aggregateMeals', () => {
  const dayEntries = () => [
    meal({ date: '2024-01-01', weightGrams: 150, servingSizeGrams: 100, caloriesPerServing: 200, proteinGramsPerServing: 10 }),
    meal({ date: '2024-01-01', weightGrams: 50, servingSizeGrams: 100, caloriesPerServing: 200, proteinGramsPerServing: 10 }),
  ];

  it('sums a day bucket', () => {
    expect(aggregateMeals(dayEntries(), 'day')).toEqual([
      { period: '2024-01-01', entryCount: 2, actualCalories: 400, actualProtein: 20 },
    ]);
  });

  it('repeats the goal on every row', () => {
    const goal = { owner: 'alice', caloriesPerDay: 2000, proteinGramsPerDay: 150 };
    const rows = aggregateMeals(
      [...dayEntries(), meal({ date: '2024-01-02', weightGrams: 100, caloriesPerServing: 500, proteinGramsPerServing: 30 })],
      'day',
      { goal }
    );

    expect(rows).toEqual([
      { period: '2024-01-01', entryCount: 2, actualCalories: 400, actualProtein: 20, targetCalories: 2000, targetProtein: 150 },
      { period: '2024-01-02', entryCount: 1, actualCalories: 500, actualProtein: 30, targetCalories: 2000, targetProtein: 150 },
    ]);
  });

  it('omits target columns without a goal', () => {
    const [row] = aggregateMeals(dayEntries(), 'day', { goal: null });
    expect(row).not.toHaveProperty('targetCalories');
    expect(row).not.toHaveProperty('targetProtein');
  });

  it('returns an empty list for no entries', () => {
    expect(aggregateMeals([], 'week')).toEqual([]);
  });

  it('groups by ISO week number, ordered numerically', () => {
    const entries = [
      meal({ date: '2024-03-04', weightGrams: 100, caloriesPerServing: 10, proteinGramsPerServing: 1 }),
      meal({ date: '2024-01-08', weightGrams: 100, caloriesPerServing: 20, proteinGramsPerServing: 2 }),
      meal({ date: '2024-01-01', weightGrams: 100, caloriesPerServing: 30, proteinGramsPerServing: 3 }),
      meal({ date: '2024-01-07', weightGrams: 100, caloriesPerServing: 40, proteinGramsPerServing: 4 }),
    ];

    expect(aggregateMeals(entries, 'week')).toEqual([
      { period: '1', entryCount: 2, actualCalories: 70, actualProtein: 7 },
      { period: '2', entryCount: 1, actualCalories: 20, actualProtein: 2 },
      { period: '10', entryCount: 1, actualCalories: 10, actualProtein: 1 },
    ]);
  });

  it('puts the same week number of different years in one bucket', () => {
    // 2024-12-30 falls in ISO week 1 of 2025
    const rows = aggregateMeals([meal({ date: '2024-01-02' }), meal({ date: '2024-12-30' })], 'week');
    expect(rows.map((r) => [r.period, r.entryCount])).toEqual([['1', 2]]);
  });

  it('groups by month and honours descending order', () => {
    const entries = [
      meal({ date: '2024-01-15' }),
      meal({ date: '2024-02-01' }),
      meal({ date: '2024-01-31' }),
      meal({ date: '2023-12-31' }),
    ];

    expect(aggregateMeals(entries, 'month').map((r) => [r.period, r.entryCount])).toEqual([
      ['2023-12', 1],
      ['2024-01', 2],
      ['2024-02', 1],
    ]);
    expect(aggregateMeals(entries, 'month', { order: 'desc' }).map((r) => r.period)).toEqual([
      '2024-02',
      '2024-01',
      '2023-12',
    ]);
  });

  it('drops entries whose date does not parse, and only those', () => {
    const entries = [
      meal({ date: '2024-05-01' }),
      meal({ date: 'not-a-date' }),
      meal({ date: '2024-02-30' }),
      meal({ date: '' }),
      meal({ date: '2024-05-02' }),
    ];

    const rows = aggregateMeals(entries, 'day');
    expect(rows.map((r) => r.period)).toEqual(['2024-05-01', '2024-05-02']);
    expect(rows.reduce((n, r) => n + r.entryCount, 0)).toBe(2);
  });

  it('counts every valid entry in exactly one bucket', () => {
    const entries = ['2024-01-01', '2024-01-09', '2024-02-14', '2024-02-15', '2024-07-04'].map((date, i) =>
      meal({ date, weightGrams: 100, caloriesPerServing: 100 * (i + 1), proteinGramsPerServing: i + 1 })
    );

    for (const bucketBy of ['day', 'week', 'month'] as const) {
      const rows = aggregateMeals(entries, bucketBy);
      expect(rows.reduce((n, r) => n + r.entryCount, 0)).toBe(5);
      expect(rows.reduce((n, r) => n + r.actualCalories, 0)).toBe(1500);
      expect(rows.reduce((n, r) => n + r.actualProtein, 0)).toBe(15);
    }
  });
});

describe('history helpers', () => {
  const history = () => [
    meal({ id: 1, date: '2024-05-01', itemName: 'Oats' }),
    meal({ id: 2, date: '2024-05-03', itemName: 'Rice ' }),
    meal({ id: 3, date: '2024-05-01', itemName: 'Apple' }),
    meal({ id: 4, date: '2024-05-02', itemName: 'Rice' }),
  ];

  it('sorts newest date first, then newest id', () => {
    expect(sortHistory(history()).map((m) => m.id)).toEqual([2, 4, 3, 1]);
  });

  it('groups the sorted history by date', () => {
    const days = groupHistoryByDate(history());
    expect(days.map((d) => [d.date, d.meals.map((m) => m.id)])).toEqual([
      ['2024-05-03', [2]],
      ['2024-05-02', [4]],
      ['2024-05-01', [3, 1]],
    ]);
  });

  it('lists distinct trimmed item names alphabetically', () => {
    expect(listItemNames([...history(), meal({ itemName: '  ' })])).toEqual(['Apple', 'Oats', 'Rice']);
  });

  it('prefers the typed item name over the picked one', () => {
    expect(resolveItemName('  Banana ', 'Rice')).toBe('Banana');
    expect(resolveItemName('   ', ' Rice ')).toBe('Rice');
    expect(resolveItemName(undefined, undefined)).toBe('');
  });
});
