import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { AuthenticatedRequest, requireUsername } from "../middleware/auth";
import { sendSuccess } from "../middleware/responseHelper";
import { GoalService } from "../services/goalService";

const saveGoalSchema = z
  .object({
    caloriesPerDay: z.number().finite().nonnegative(),
    proteinGramsPerDay: z.number().finite().nonnegative(),
  })
  .strict();

export function createGoalsRouter(goals: GoalService): Router {
  const router = Router();

  // GET /api/v1/goals - { goal: Goal | null, defaults }
  router.get(
    "/",
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      sendSuccess(res, await goals.getGoal(requireUsername(req)));
    })
  );

  // PUT /api/v1/goals - replaces the whole goal
  router.put(
    "/",
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      const targets = saveGoalSchema.parse(req.body);
      sendSuccess(res, await goals.saveGoal(requireUsername(req), targets));
    })
  );

  return router;
}
