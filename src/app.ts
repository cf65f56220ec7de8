import express, { Express, Request, Response } from "express";
import cors from "cors";

import { AppConfig } from "./env";
import { authMiddleware } from "./middleware/auth";
import { rateLimitMiddleware } from "./middleware/rateLimiter";
import { httpLogger, withRequestId } from "./middleware/requestLogging";
import { errorHandler, notFoundHandler } from "./middlewares/errorHandler";
import { createAuthRouter } from "./routes/auth";
import { createGoalsRouter } from "./routes/goals";
import { createMealsRouter } from "./routes/meals";
import { createSummaryRouter } from "./routes/summary";
import { AuthService } from "./services/authService";
import { GoalService } from "./services/goalService";
import { MealService } from "./services/mealService";
import { DataStore } from "./services/store";
import { SummaryService } from "./services/summaryService";

export interface AppServices {
  auth: AuthService;
  meals: MealService;
  goals: GoalService;
  summaries: SummaryService;
}

export function createServices(store: DataStore, config: AppConfig): AppServices {
  return {
    auth: new AuthService(store.users, config),
    meals: new MealService(store.meals, config.timeZone),
    goals: new GoalService(store.goals, config.goalDefaults),
    summaries: new SummaryService(store.meals, store.goals, config.timeZone),
  };
}

export function createApp(services: AppServices, config: AppConfig): Express {
  const app = express();

  // ======================================================================
  //                     CORE MIDDLEWARE (CORS, LOGGING, BODY)
  // ======================================================================

  const allowlist = new Set<string>(config.allowedOrigins ?? []);
  app.use(
    cors({
      origin: (origin, cb) => {
        // Allow server-to-server/no-origin requests
        if (!origin) return cb(null, true);
        return cb(null, allowlist.has(origin));
      },
      methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "Accept", "X-Request-Id"],
      exposedHeaders: ["X-Request-Id"],
    })
  );

  app.use(withRequestId);
  if (config.accessLog) {
    app.use(httpLogger());
  }

  app.use(express.json({ limit: "100kb" }));

  // ======================================================================
  //                       HEALTH CHECK + ROUTES
  // ======================================================================

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).send("ok");
  });

  const requireAuth = authMiddleware(config.jwtSecret);
  const loginLimiter = rateLimitMiddleware({
    windowMs: config.loginRateLimit.windowMs,
    maxRequests: config.loginRateLimit.maxRequests,
    message: "Too many login attempts, please try again later",
  });

  app.use("/api/v1/auth", createAuthRouter(services.auth, { requireAuth, loginLimiter }));
  app.use("/api/v1/meals", requireAuth, createMealsRouter(services.meals));
  app.use("/api/v1/goals", requireAuth, createGoalsRouter(services.goals));
  app.use("/api/v1/summary", requireAuth, createSummaryRouter(services.summaries));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
