import { Goal } from "../domain/types";
import { GoalRepository } from "./store";

export interface GoalTargets {
  caloriesPerDay: number;
  proteinGramsPerDay: number;
}

export interface GoalView {
  goal: Goal | null;
  /** Pre-fill values for the goal form when no goal is saved yet. */
  defaults: GoalTargets;
}

/**
 * One goal per user, replaced wholesale on save.
 */
export class GoalService {
  constructor(
    private readonly goals: GoalRepository,
    private readonly defaults: GoalTargets
  ) {}

  async getGoal(owner: string): Promise<GoalView> {
    return { goal: await this.goals.get(owner), defaults: { ...this.defaults } };
  }

  async saveGoal(owner: string, targets: GoalTargets): Promise<Goal> {
    const goal = await this.goals.save({
      owner,
      caloriesPerDay: targets.caloriesPerDay,
      proteinGramsPerDay: targets.proteinGramsPerDay,
    });
    console.log(
      `[goals] ${owner} set ${goal.caloriesPerDay.toFixed(0)} kcal / ${goal.proteinGramsPerDay.toFixed(0)} g protein`
    );
    return goal;
  }
}
