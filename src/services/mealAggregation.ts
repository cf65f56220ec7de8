// src/services/mealAggregation.ts
import {
  BucketBy,
  Goal,
  HistoryDay,
  ItemDefaults,
  MealEntry,
  SortOrder,
  SummaryRow,
} from "../domain/types";
import { dayKey, isoWeekNumber, monthKey, parseDateOnly } from "../utils/date";

/**
 * Pure computations over a snapshot of a user's meals: default recall for the
 * add-meal form, period summaries, and history ordering. Nothing here touches
 * storage; callers hand in the entries they loaded.
 */

export const EMPTY_ITEM_DEFAULTS: Readonly<ItemDefaults> = Object.freeze({
  servingSizeGrams: 1,
  caloriesPerServing: 0,
  proteinGramsPerServing: 0,
});

/** The typed-in name wins over the picked one; both are trimmed. */
export function resolveItemName(newItem?: string | null, chosenItem?: string | null): string {
  const typed = (newItem ?? "").trim();
  return typed !== "" ? typed : (chosenItem ?? "").trim();
}

/**
 * Serving size and per-serving values of the most recently created entry for
 * `itemName`. Names match after trimming and are case-sensitive. Recency is the
 * entry id, not its date, because dates can be edited.
 */
export function deriveItemDefaults(
  history: readonly MealEntry[],
  owner: string,
  itemName: string
): ItemDefaults {
  const target = itemName.trim();
  if (target === "") return { ...EMPTY_ITEM_DEFAULTS };

  let latest: MealEntry | undefined;
  for (const entry of history) {
    if (entry.owner !== owner) continue;
    if (entry.itemName.trim() !== target) continue;
    if (!(entry.weightGrams > 0) || !(entry.servingSizeGrams > 0)) continue;
    if (!latest || entry.id > latest.id) latest = entry;
  }

  if (!latest) return { ...EMPTY_ITEM_DEFAULTS };

  // inverse of the forward scaling in computeMealTotals
  return {
    servingSizeGrams: latest.servingSizeGrams,
    caloriesPerServing: (latest.caloriesTotal / latest.weightGrams) * latest.servingSizeGrams,
    proteinGramsPerServing:
      (latest.proteinGramsTotal / latest.weightGrams) * latest.servingSizeGrams,
  };
}

interface BucketKey {
  period: string;
  sortKey: string | number;
}

export function bucketKeyFor(date: string, bucketBy: BucketBy): BucketKey | null {
  const parsed = parseDateOnly(date);
  if (!parsed) return null;

  switch (bucketBy) {
    case "day": {
      const key = dayKey(parsed);
      return { period: key, sortKey: key };
    }
    case "week": {
      // week number only, so the same week of different years shares a bucket
      const week = isoWeekNumber(parsed);
      return { period: String(week), sortKey: week };
    }
    case "month": {
      const key = monthKey(parsed);
      return { period: key, sortKey: key };
    }
  }
}

function compareKeys(a: string | number, b: string | number): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  return String(a) < String(b) ? -1 : String(a) > String(b) ? 1 : 0;
}

export interface AggregateOptions {
  goal?: Goal | null;
  order?: SortOrder;
}

/**
 * Sums calories and protein per day, ISO week or month. Entries with an
 * unparseable date are left out. A goal, when given, is repeated unscaled on
 * every row.
 */
export function aggregateMeals(
  entries: readonly MealEntry[],
  bucketBy: BucketBy,
  options: AggregateOptions = {}
): SummaryRow[] {
  const { goal = null, order = "asc" } = options;
  const buckets = new Map<string, { sortKey: string | number; row: SummaryRow }>();

  for (const entry of entries) {
    const key = bucketKeyFor(entry.date, bucketBy);
    if (!key) continue;

    let bucket = buckets.get(key.period);
    if (!bucket) {
      bucket = {
        sortKey: key.sortKey,
        row: { period: key.period, entryCount: 0, actualCalories: 0, actualProtein: 0 },
      };
      buckets.set(key.period, bucket);
    }
    bucket.row.entryCount += 1;
    bucket.row.actualCalories += entry.caloriesTotal;
    bucket.row.actualProtein += entry.proteinGramsTotal;
  }

  const sorted = Array.from(buckets.values()).sort((a, b) => compareKeys(a.sortKey, b.sortKey));
  if (order === "desc") sorted.reverse();

  return sorted.map(({ row }) =>
    goal
      ? { ...row, targetCalories: goal.caloriesPerDay, targetProtein: goal.proteinGramsPerDay }
      : row
  );
}

/** Newest date first; within a date, the most recently created entry first. */
export function sortHistory(entries: readonly MealEntry[]): MealEntry[] {
  return [...entries].sort((a, b) => {
    if (a.date !== b.date) return a.date < b.date ? 1 : -1;
    return b.id - a.id;
  });
}

export function groupHistoryByDate(entries: readonly MealEntry[]): HistoryDay[] {
  const days: HistoryDay[] = [];
  for (const entry of sortHistory(entries)) {
    const last = days[days.length - 1];
    if (last && last.date === entry.date) {
      last.meals.push(entry);
    } else {
      days.push({ date: entry.date, meals: [entry] });
    }
  }
  return days;
}

export function listItemNames(entries: readonly MealEntry[]): string[] {
  const names = new Set<string>();
  for (const entry of entries) {
    const name = entry.itemName.trim();
    if (name) names.add(name);
  }
  return Array.from(names).sort();
}
