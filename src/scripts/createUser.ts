// src/scripts/createUser.ts
// Usage: npm run create-user -- <username> <password>
import "dotenv/config";
import { z } from "zod";
import { createPool } from "../db/pool";
import { runMigrations } from "../db/runMigrations";
import { AuthService } from "../services/authService";
import { createPgStore } from "../services/pgStore";

const argsSchema = z.tuple([
  z.string().trim().min(1, "username is required"),
  z.string().min(1, "password is required"),
]);

const envSchema = z.object({
  DATABASE_URL: z.string().min(1, "DATABASE_URL is required"),
  DATABASE_SSL: z.enum(["true", "false"]).default("false"),
  BCRYPT_ROUNDS: z.string().regex(/^\d+$/).default("10"),
});

async function main(): Promise<number> {
  const args = argsSchema.safeParse(process.argv.slice(2, 4));
  if (!args.success) {
    console.error("Usage: create-user <username> <password>");
    return 2;
  }
  const env = envSchema.parse(process.env);
  const [username, password] = args.data;

  const pool = createPool(env.DATABASE_URL, env.DATABASE_SSL === "true");
  const store = createPgStore(pool);
  try {
    await runMigrations(pool);
    const auth = new AuthService(store.users, {
      // tokens are never issued from the CLI
      jwtSecret: "",
      jwtExpiresIn: "12h",
      jwtRememberExpiresIn: "30d",
      bcryptRounds: Number(env.BCRYPT_ROUNDS),
    });
    const result = await auth.createUser(username, password);
    console.log(result === "created" ? `✅ Created user ${username}` : `User ${username} already exists`);
    return 0;
  } finally {
    await store.close();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error("❌ Error:", err instanceof Error ? err.message : err);
    process.exit(1);
  }
);
