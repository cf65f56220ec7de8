import { BucketBy, Goal, MealEntry, SortOrder, SummaryRow } from "../domain/types";
import { todayDateOnly } from "../utils/date";
import { aggregateMeals, sortHistory } from "./mealAggregation";
import { GoalRepository, MealRepository } from "./store";

export interface PeriodSummary {
  groupBy: BucketBy;
  order: SortOrder;
  hasGoal: boolean;
  rows: SummaryRow[];
}

export interface DaySummary {
  date: string;
  totals: { calories: number; protein: number };
  goal: Goal | null;
  meals: Array<Pick<MealEntry, "id" | "itemName" | "mealType" | "caloriesTotal" | "proteinGramsTotal">>;
}

export class SummaryService {
  constructor(
    private readonly meals: MealRepository,
    private readonly goals: GoalRepository,
    private readonly timeZone: string
  ) {}

  async summarize(owner: string, groupBy: BucketBy, order: SortOrder = "asc"): Promise<PeriodSummary> {
    const [entries, goal] = await Promise.all([
      this.meals.listForUser(owner),
      this.goals.get(owner),
    ]);
    return { groupBy, order, hasGoal: goal !== null, rows: aggregateMeals(entries, groupBy, { goal, order }) };
  }

  /** Totals and per-meal breakdown for one date (today by default). */
  async daySummary(owner: string, date?: string): Promise<DaySummary> {
    const day = date ?? todayDateOnly(this.timeZone);
    const [entries, goal] = await Promise.all([
      this.meals.listForUser(owner),
      this.goals.get(owner),
    ]);
    const todays = entries.filter((m) => m.date === day);
    const [row] = aggregateMeals(todays, "day");

    return {
      date: day,
      totals: { calories: row?.actualCalories ?? 0, protein: row?.actualProtein ?? 0 },
      goal,
      meals: sortHistory(todays)
        .reverse()
        .map(({ id, itemName, mealType, caloriesTotal, proteinGramsTotal }) => ({
          id,
          itemName,
          mealType,
          caloriesTotal,
          proteinGramsTotal,
        })),
    };
  }
}
