import request from "supertest";
import { Express } from "express";
import { createApp, createServices, AppServices } from "../src/app";
import { AppConfig } from "../src/env";
import { createMemoryStore } from "../src/services/inMemoryStore";
import { DataStore } from "../src/services/store";

export const TEST_PASSWORD = "test-password";

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    jwtSecret: "test-secret-test-secret-test-secret",
    jwtExpiresIn: "12h",
    jwtRememberExpiresIn: "30d",
    bcryptRounds: 4,
    timeZone: "UTC",
    goalDefaults: { caloriesPerDay: 2000, proteinGramsPerDay: 100 },
    allowedOrigins: ["http://localhost:5173"],
    loginRateLimit: { windowMs: 60000, maxRequests: 1000 },
    accessLog: false,
    ...overrides,
  };
}

export interface TestContext {
  app: Express;
  store: DataStore;
  services: AppServices;
  config: AppConfig;
}

export function buildTestApp(overrides: Partial<AppConfig> = {}): TestContext {
  const config = testConfig(overrides);
  const store = createMemoryStore();
  const services = createServices(store, config);
  return { app: createApp(services, config), store, services, config };
}

/** Creates the user and returns a bearer token for them. */
export async function signIn(ctx: TestContext, username: string): Promise<string> {
  await ctx.services.auth.createUser(username, TEST_PASSWORD);
  const res = await request(ctx.app)
    .post("/api/v1/auth/login")
    .send({ username, password: TEST_PASSWORD });
  return res.body.data.token;
}

export function silenceConsole(): void {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
}
