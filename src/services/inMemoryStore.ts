import { Goal, MealEntry, UserRecord } from "../domain/types";
import { DataStore } from "./store";

/**
 * Process-local store with the same contract as the Postgres one. Used by the
 * test suite and by `npm start` when no DATABASE_URL is wired (demo mode).
 */
export function createMemoryStore(): DataStore {
  const users = new Map<string, UserRecord>();
  const meals: MealEntry[] = [];
  const goals = new Map<string, Goal>();
  let nextMealId = 1;

  return {
    users: {
      async count() {
        return users.size;
      },
      async findByUsername(username) {
        const user = users.get(username);
        return user ? { ...user } : null;
      },
      async create(user) {
        if (users.has(user.username)) return false;
        users.set(user.username, { ...user });
        return true;
      },
      async createIfNone(user) {
        // no await between the check and the insert
        if (users.size > 0) return false;
        users.set(user.username, { ...user });
        return true;
      },
      async updatePassword(username, passwordHash) {
        const user = users.get(username);
        if (user) user.passwordHash = passwordHash;
      },
    },

    meals: {
      async listForUser(owner) {
        return meals.filter((m) => m.owner === owner).map((m) => ({ ...m }));
      },
      async findById(owner, id) {
        const meal = meals.find((m) => m.id === id && m.owner === owner);
        return meal ? { ...meal } : null;
      },
      async create(entry) {
        const meal: MealEntry = { ...entry, id: nextMealId++ };
        meals.push(meal);
        return { ...meal };
      },
      async update(owner, id, fields) {
        const idx = meals.findIndex((m) => m.id === id && m.owner === owner);
        if (idx === -1) return null;
        meals[idx] = { ...meals[idx], ...fields };
        return { ...meals[idx] };
      },
      async delete(owner, id) {
        const idx = meals.findIndex((m) => m.id === id && m.owner === owner);
        if (idx === -1) return false;
        meals.splice(idx, 1);
        return true;
      },
    },

    goals: {
      async get(owner) {
        const goal = goals.get(owner);
        return goal ? { ...goal } : null;
      },
      async save(goal) {
        goals.set(goal.owner, { ...goal });
        return { ...goal };
      },
    },

    async close() {
      users.clear();
      meals.length = 0;
      goals.clear();
    },
  };
}
