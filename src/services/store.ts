// src/services/store.ts
import { Goal, MealEntry, MealEntryFields, NewMealEntry, UserRecord } from "../domain/types";

/**
 * Persistence boundary. Every meal read or write is scoped by owner, so one
 * user can never address another user's entries.
 */

export interface UserRepository {
  count(): Promise<number>;
  findByUsername(username: string): Promise<UserRecord | null>;
  /** Resolves false when the username is already taken. */
  create(user: UserRecord): Promise<boolean>;
  /** Inserts only while the user table is empty; resolves false otherwise. */
  createIfNone(user: UserRecord): Promise<boolean>;
  updatePassword(username: string, passwordHash: string): Promise<void>;
}

export interface MealRepository {
  /** All of the owner's meals, oldest id first. */
  listForUser(owner: string): Promise<MealEntry[]>;
  findById(owner: string, id: number): Promise<MealEntry | null>;
  create(entry: NewMealEntry): Promise<MealEntry>;
  update(
    owner: string,
    id: number,
    fields: MealEntryFields & Pick<MealEntry, "caloriesTotal" | "proteinGramsTotal">
  ): Promise<MealEntry | null>;
  delete(owner: string, id: number): Promise<boolean>;
}

export interface GoalRepository {
  get(owner: string): Promise<Goal | null>;
  save(goal: Goal): Promise<Goal>;
}

export interface DataStore {
  users: UserRepository;
  meals: MealRepository;
  goals: GoalRepository;
  close(): Promise<void>;
}
