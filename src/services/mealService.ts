// src/services/mealService.ts
import {
  HistoryDay,
  ItemDefaults,
  MealEntry,
  MealEntryFields,
  ScaledTotals,
  ServingInput,
  normalizeMealType,
} from "../domain/types";
import { todayDateOnly } from "../utils/date";
import { NotFoundError, ValidationError } from "../utils/httpErrors";
import { computeMealTotals } from "./nutritionScaling";
import {
  deriveItemDefaults,
  groupHistoryByDate,
  listItemNames,
  resolveItemName,
  sortHistory,
} from "./mealAggregation";
import { MealRepository } from "./store";

export const ITEM_NAME_REQUIRED = "Please enter or select an item name.";

export interface CreateMealInput extends ServingInput {
  /** Name typed by the user; wins over `chosenItem` when not blank. */
  itemName?: string;
  /** Name picked from the user's previous items. */
  chosenItem?: string;
  date?: string;
  /** Free text; anything but a known meal type becomes "Other". */
  mealType?: string;
}

export type MealChanges = Partial<Omit<MealEntryFields, "mealType">> & { mealType?: string };

export interface HistoryView {
  meals: MealEntry[];
  days: HistoryDay[];
}

export class MealService {
  constructor(
    private readonly meals: MealRepository,
    private readonly timeZone: string
  ) {}

  previewMeal(input: ServingInput): ScaledTotals {
    return computeMealTotals(input);
  }

  async createMeal(owner: string, input: CreateMealInput): Promise<MealEntry> {
    const itemName = resolveItemName(input.itemName, input.chosenItem);
    if (!itemName) throw new ValidationError(ITEM_NAME_REQUIRED);

    const fields: MealEntryFields = {
      date: input.date ?? todayDateOnly(this.timeZone),
      itemName,
      mealType: normalizeMealType(input.mealType),
      weightGrams: input.weightGrams,
      servingSizeGrams: input.servingSizeGrams,
      caloriesPerServing: input.caloriesPerServing,
      proteinGramsPerServing: input.proteinGramsPerServing,
    };
    const { caloriesTotal, proteinGramsTotal } = computeMealTotals(fields);

    const meal = await this.meals.create({ ...fields, owner, caloriesTotal, proteinGramsTotal });
    console.log(`[meals] ${owner} logged #${meal.id} "${meal.itemName}" on ${meal.date}`);
    return meal;
  }

  /**
   * Applies an edit command. Fields left out keep their stored values and the
   * totals are always recomputed from the result.
   */
  async updateMeal(owner: string, id: number, changes: MealChanges): Promise<MealEntry> {
    const existing = await this.meals.findById(owner, id);
    if (!existing) throw new NotFoundError("Meal not found");

    const itemName = changes.itemName === undefined ? existing.itemName : changes.itemName.trim();
    if (!itemName) throw new ValidationError(ITEM_NAME_REQUIRED);

    const fields: MealEntryFields = {
      date: changes.date ?? existing.date,
      itemName,
      mealType: normalizeMealType(changes.mealType ?? existing.mealType),
      weightGrams: changes.weightGrams ?? existing.weightGrams,
      servingSizeGrams: changes.servingSizeGrams ?? existing.servingSizeGrams,
      caloriesPerServing: changes.caloriesPerServing ?? existing.caloriesPerServing,
      proteinGramsPerServing: changes.proteinGramsPerServing ?? existing.proteinGramsPerServing,
    };
    const { caloriesTotal, proteinGramsTotal } = computeMealTotals(fields);

    const updated = await this.meals.update(owner, id, {
      ...fields,
      caloriesTotal,
      proteinGramsTotal,
    });
    if (!updated) throw new NotFoundError("Meal not found");
    return updated;
  }

  async deleteMeal(owner: string, id: number): Promise<void> {
    const deleted = await this.meals.delete(owner, id);
    if (!deleted) throw new NotFoundError("Meal not found");
    console.log(`[meals] ${owner} deleted #${id}`);
  }

  async getMeal(owner: string, id: number): Promise<MealEntry> {
    const meal = await this.meals.findById(owner, id);
    if (!meal) throw new NotFoundError("Meal not found");
    return meal;
  }

  async listHistory(owner: string, filter: { date?: string } = {}): Promise<HistoryView> {
    const all = await this.meals.listForUser(owner);
    const selected = filter.date ? all.filter((m) => m.date === filter.date) : all;
    return { meals: sortHistory(selected), days: groupHistoryByDate(selected) };
  }

  async listItemNames(owner: string): Promise<string[]> {
    return listItemNames(await this.meals.listForUser(owner));
  }

  async getItemDefaults(owner: string, itemName: string): Promise<ItemDefaults> {
    if (!itemName.trim()) return deriveItemDefaults([], owner, itemName);
    return deriveItemDefaults(await this.meals.listForUser(owner), owner, itemName);
  }
}
