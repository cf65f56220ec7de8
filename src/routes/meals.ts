import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { AuthenticatedRequest, requireUsername } from "../middleware/auth";
import { sendSuccess } from "../middleware/responseHelper";
import { validateDate, validateNumericId } from "../middleware/validation";
import { resolveItemName } from "../services/mealAggregation";
import { MealService } from "../services/mealService";
import { isDateOnly } from "../utils/date";

const dateOnly = z.string().refine(isDateOnly, "Date must be a valid YYYY-MM-DD date");
const nonNegative = z.number().finite().nonnegative();
const itemText = z.string().max(200);
// blank or unknown values are stored as "Other"
const mealTypeText = z.string().max(40);

const servingSchema = z.object({
  weightGrams: nonNegative,
  servingSizeGrams: z.number().finite().positive(),
  caloriesPerServing: nonNegative,
  proteinGramsPerServing: nonNegative,
});

const createMealSchema = servingSchema
  .extend({
    itemName: itemText.optional(),
    chosenItem: itemText.optional(),
    date: dateOnly.optional(),
    mealType: mealTypeText.optional(),
  })
  .strict();

// the form may hold a zero or negative serving size while the user is typing
const previewSchema = servingSchema.extend({
  servingSizeGrams: z.number().finite(),
});

const updateMealSchema = servingSchema
  .partial()
  .extend({
    itemName: itemText.optional(),
    date: dateOnly.optional(),
    mealType: mealTypeText.optional(),
  })
  .strict();

const defaultsQuerySchema = z.object({
  item: z.string().optional(),
  chosenItem: z.string().optional(),
});

export function createMealsRouter(meals: MealService): Router {
  const router = Router();

  // GET /api/v1/meals?date=YYYY-MM-DD
  router.get(
    "/",
    validateDate,
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      const date = typeof req.query.date === "string" ? req.query.date : undefined;
      sendSuccess(res, await meals.listHistory(requireUsername(req), { date }));
    })
  );

  // POST /api/v1/meals/preview - totals for the form, nothing stored
  router.post("/preview", (req, res) => {
    sendSuccess(res, meals.previewMeal(previewSchema.parse(req.body)));
  });

  // GET /api/v1/meals/items - previous item names for the picker
  router.get(
    "/items",
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      sendSuccess(res, { items: await meals.listItemNames(requireUsername(req)) });
    })
  );

  // GET /api/v1/meals/defaults?item=Rice
  router.get(
    "/defaults",
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      const query = defaultsQuerySchema.parse(req.query);
      const itemName = resolveItemName(query.item, query.chosenItem);
      const defaults = await meals.getItemDefaults(requireUsername(req), itemName);
      sendSuccess(res, { itemName, ...defaults });
    })
  );

  router.post(
    "/",
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      const input = createMealSchema.parse(req.body);
      sendSuccess(res, await meals.createMeal(requireUsername(req), input), 201);
    })
  );

  router.get(
    "/:id",
    validateNumericId,
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      sendSuccess(res, await meals.getMeal(requireUsername(req), Number(req.params.id)));
    })
  );

  router.patch(
    "/:id",
    validateNumericId,
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      const changes = updateMealSchema.parse(req.body);
      sendSuccess(res, await meals.updateMeal(requireUsername(req), Number(req.params.id), changes));
    })
  );

  router.delete(
    "/:id",
    validateNumericId,
    asyncHandler(async (req: AuthenticatedRequest, res) => {
      await meals.deleteMeal(requireUsername(req), Number(req.params.id));
      res.status(204).send();
    })
  );

  return router;
}
