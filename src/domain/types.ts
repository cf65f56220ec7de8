export const MEAL_TYPES = ["Breakfast", "Lunch", "Dinner", "Snack", "Other"] as const;

export type MealType = (typeof MEAL_TYPES)[number];

export const DEFAULT_MEAL_TYPE: MealType = "Other";

export type BucketBy = "day" | "week" | "month";

export type SortOrder = "asc" | "desc";

export interface ServingInput {
  weightGrams: number;
  servingSizeGrams: number;
  caloriesPerServing: number;
  proteinGramsPerServing: number;
}

export interface ScaledTotals {
  scaleFactor: number;
  caloriesTotal: number;
  proteinGramsTotal: number;
}

/** Fields a caller may set on a meal; totals are never among them. */
export interface MealEntryFields extends ServingInput {
  date: string; // YYYY-MM-DD
  itemName: string;
  mealType: MealType;
}

export interface NewMealEntry extends MealEntryFields {
  owner: string;
  caloriesTotal: number;
  proteinGramsTotal: number;
}

export interface MealEntry extends NewMealEntry {
  id: number;
}

export interface Goal {
  owner: string;
  caloriesPerDay: number;
  proteinGramsPerDay: number;
}

export interface ItemDefaults {
  servingSizeGrams: number;
  caloriesPerServing: number;
  proteinGramsPerServing: number;
}

export interface SummaryRow {
  period: string;
  entryCount: number;
  actualCalories: number;
  actualProtein: number;
  targetCalories?: number;
  targetProtein?: number;
}

export interface HistoryDay {
  date: string;
  meals: MealEntry[];
}

export interface UserRecord {
  username: string;
  passwordHash: string;
}

export function isMealType(value: unknown): value is MealType {
  return MEAL_TYPES.some((type) => type === value);
}

/** Blank or unrecognised meal types are stored as "Other". */
export function normalizeMealType(value: unknown): MealType {
  if (typeof value !== "string") return DEFAULT_MEAL_TYPE;
  const trimmed = value.trim();
  return isMealType(trimmed) ? trimmed : DEFAULT_MEAL_TYPE;
}
