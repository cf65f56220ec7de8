import { Router } from "express";
import { BucketBy, SortOrder } from "../domain/types";
import { asyncHandler } from "../middleware/asyncHandler";
import { AuthenticatedRequest, requireUsername } from "../middleware/auth";
import { sendSuccess } from "../middleware/responseHelper";
import { validateDate, validateSummaryQuery } from "../middleware/validation";
import { SummaryService } from "../services/summaryService";

function toBucketBy(value: unknown): BucketBy {
  return value === "week" || value === "month" ? value : "day";
}

function toSortOrder(value: unknown): SortOrder {
  return value === "desc" ? "desc" : "asc";
}

export function createSummaryRouter(summaries: SummaryService): Router {
  const router = Router();

  // GET /api/v1/summary?groupBy=day|week|month&order=asc|desc
  router.get(
    "/",
    validateSummaryQuery,
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      const summary = await summaries.summarize(
        requireUsername(req),
        toBucketBy(req.query.groupBy),
        toSortOrder(req.query.order)
      );
      sendSuccess(res, summary);
    })
  );

  // GET /api/v1/summary/day?date=YYYY-MM-DD (defaults to today)
  router.get(
    "/day",
    validateDate,
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      const date = typeof req.query.date === "string" ? req.query.date : undefined;
      sendSuccess(res, await summaries.daySummary(requireUsername(req), date));
    })
  );

  return router;
}
