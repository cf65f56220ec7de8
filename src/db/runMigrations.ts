// src/db/runMigrations.ts
// Auto-run database migrations on startup
import { Pool } from "pg";

export async function runMigrations(pool: Pool): Promise<void> {
  console.log("[migrations] Running database migrations...");

  // Inline migration SQL (easier than reading files in deployed environment)
  await pool.query(`
    CREATE TABLE IF NOT EXISTS users (
      username TEXT PRIMARY KEY,
      password_hash TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS meals (
      id SERIAL PRIMARY KEY,
      username TEXT NOT NULL REFERENCES users(username) ON DELETE CASCADE,
      date DATE NOT NULL,
      item TEXT NOT NULL,
      weight DOUBLE PRECISION NOT NULL DEFAULT 0,
      serving_size DOUBLE PRECISION NOT NULL DEFAULT 1,
      calories_per_serving DOUBLE PRECISION NOT NULL DEFAULT 0,
      protein_per_serving DOUBLE PRECISION NOT NULL DEFAULT 0,
      calories DOUBLE PRECISION NOT NULL DEFAULT 0,
      protein DOUBLE PRECISION NOT NULL DEFAULT 0,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );

    CREATE INDEX IF NOT EXISTS idx_meals_username_id ON meals(username, id);

    CREATE TABLE IF NOT EXISTS goals (
      username TEXT PRIMARY KEY REFERENCES users(username) ON DELETE CASCADE,
      calories DOUBLE PRECISION NOT NULL,
      protein DOUBLE PRECISION NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  // meal_type arrived after the first release; older rows get 'Other'
  await pool.query(`ALTER TABLE meals ADD COLUMN IF NOT EXISTS meal_type TEXT DEFAULT 'Other'`);
  const backfill = await pool.query(
    `UPDATE meals SET meal_type = 'Other' WHERE meal_type IS NULL OR TRIM(meal_type) = ''`
  );
  if (backfill.rowCount) {
    console.log(`[migrations] Backfilled meal_type on ${backfill.rowCount} row(s)`);
  }

  console.log("[migrations] ✅ Database ready");
}
