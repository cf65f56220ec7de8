// src/services/pgStore.ts
import { Pool } from "pg";
import { Goal, MealEntry, normalizeMealType } from "../domain/types";
import { DataStore } from "./store";

interface MealRow {
  id: number;
  username: string;
  date: string;
  item: string;
  weight: number;
  serving_size: number;
  calories_per_serving: number;
  protein_per_serving: number;
  calories: number;
  protein: number;
  meal_type: string | null;
}

interface GoalRow {
  username: string;
  calories: number;
  protein: number;
}

interface UserRow {
  username: string;
  password_hash: string;
}

const MEAL_COLUMNS = `id, username, date, item, weight, serving_size,
  calories_per_serving, protein_per_serving, calories, protein, meal_type`;

function toMealEntry(row: MealRow): MealEntry {
  return {
    id: row.id,
    owner: row.username,
    date: row.date,
    itemName: row.item,
    weightGrams: Number(row.weight),
    servingSizeGrams: Number(row.serving_size),
    caloriesPerServing: Number(row.calories_per_serving),
    proteinGramsPerServing: Number(row.protein_per_serving),
    caloriesTotal: Number(row.calories),
    proteinGramsTotal: Number(row.protein),
    mealType: normalizeMealType(row.meal_type),
  };
}

function toGoal(row: GoalRow): Goal {
  return {
    owner: row.username,
    caloriesPerDay: Number(row.calories),
    proteinGramsPerDay: Number(row.protein),
  };
}

export function createPgStore(pool: Pool): DataStore {
  return {
    users: {
      async count() {
        const result = await pool.query<{ count: string }>(`SELECT COUNT(*) AS count FROM users`);
        return Number(result.rows[0]?.count ?? 0);
      },
      async findByUsername(username) {
        const result = await pool.query<UserRow>(
          `SELECT username, password_hash FROM users WHERE username = $1`,
          [username]
        );
        const row = result.rows[0];
        return row ? { username: row.username, passwordHash: row.password_hash } : null;
      },
      async create(user) {
        const result = await pool.query(
          `INSERT INTO users (username, password_hash) VALUES ($1, $2)
           ON CONFLICT (username) DO NOTHING`,
          [user.username, user.passwordHash]
        );
        return result.rowCount === 1;
      },
      async createIfNone(user) {
        const client = await pool.connect();
        try {
          await client.query("BEGIN");
          // blocks a concurrent first-user insert until this transaction ends
          await client.query("LOCK TABLE users IN SHARE ROW EXCLUSIVE MODE");
          const result = await client.query(
            `INSERT INTO users (username, password_hash)
             SELECT $1, $2 WHERE NOT EXISTS (SELECT 1 FROM users)`,
            [user.username, user.passwordHash]
          );
          await client.query("COMMIT");
          return result.rowCount === 1;
        } catch (err) {
          await client.query("ROLLBACK");
          throw err;
        } finally {
          client.release();
        }
      },
      async updatePassword(username, passwordHash) {
        await pool.query(`UPDATE users SET password_hash = $2 WHERE username = $1`, [
          username,
          passwordHash,
        ]);
      },
    },

    meals: {
      async listForUser(owner) {
        const result = await pool.query<MealRow>(
          `SELECT ${MEAL_COLUMNS} FROM meals WHERE username = $1 ORDER BY id ASC`,
          [owner]
        );
        return result.rows.map(toMealEntry);
      },
      async findById(owner, id) {
        const result = await pool.query<MealRow>(
          `SELECT ${MEAL_COLUMNS} FROM meals WHERE id = $1 AND username = $2`,
          [id, owner]
        );
        const row = result.rows[0];
        return row ? toMealEntry(row) : null;
      },
      async create(entry) {
        const result = await pool.query<MealRow>(
          `INSERT INTO meals (
             username, date, item, weight, serving_size,
             calories_per_serving, protein_per_serving, calories, protein, meal_type
           )
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
           RETURNING ${MEAL_COLUMNS}`,
          [
            entry.owner,
            entry.date,
            entry.itemName,
            entry.weightGrams,
            entry.servingSizeGrams,
            entry.caloriesPerServing,
            entry.proteinGramsPerServing,
            entry.caloriesTotal,
            entry.proteinGramsTotal,
            entry.mealType,
          ]
        );
        return toMealEntry(result.rows[0]);
      },
      async update(owner, id, fields) {
        const result = await pool.query<MealRow>(
          `UPDATE meals SET
             date = $3, item = $4, weight = $5, serving_size = $6,
             calories_per_serving = $7, protein_per_serving = $8,
             calories = $9, protein = $10, meal_type = $11
           WHERE id = $1 AND username = $2
           RETURNING ${MEAL_COLUMNS}`,
          [
            id,
            owner,
            fields.date,
            fields.itemName,
            fields.weightGrams,
            fields.servingSizeGrams,
            fields.caloriesPerServing,
            fields.proteinGramsPerServing,
            fields.caloriesTotal,
            fields.proteinGramsTotal,
            fields.mealType,
          ]
        );
        const row = result.rows[0];
        return row ? toMealEntry(row) : null;
      },
      async delete(owner, id) {
        const result = await pool.query(`DELETE FROM meals WHERE id = $1 AND username = $2`, [
          id,
          owner,
        ]);
        return result.rowCount === 1;
      },
    },

    goals: {
      async get(owner) {
        const result = await pool.query<GoalRow>(
          `SELECT username, calories, protein FROM goals WHERE username = $1`,
          [owner]
        );
        const row = result.rows[0];
        return row ? toGoal(row) : null;
      },
      async save(goal) {
        const result = await pool.query<GoalRow>(
          `INSERT INTO goals (username, calories, protein)
           VALUES ($1, $2, $3)
           ON CONFLICT (username)
           DO UPDATE SET calories = EXCLUDED.calories, protein = EXCLUDED.protein, updated_at = NOW()
           RETURNING username, calories, protein`,
          [goal.owner, goal.caloriesPerDay, goal.proteinGramsPerDay]
        );
        return toGoal(result.rows[0]);
      },
    },

    async close() {
      await pool.end();
    },
  };
}
