// src/middleware/validation.ts
// Path and query validation using express-validator; bodies are parsed with zod in the routes.

import { param, query, validationResult } from "express-validator";
import { Request, Response, NextFunction } from "express";
import { isDateOnly } from "../utils/date";

/**
 * Validation error handler middleware
 * Returns 400 Bad Request with validation errors
 */
export function handleValidationErrors(req: Request, res: Response, next: NextFunction) {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    return res.status(400).json({
      ok: false,
      error: "Validation failed",
      meta: { type: "validation" },
      details: errors.array(),
    });
  }
  next();
}

/**
 * Numeric ID validation
 */
export const validateNumericId = [
  param("id")
    .isInt({ min: 1 })
    .withMessage("Valid numeric ID required"),

  handleValidationErrors,
];

/**
 * Date validation (YYYY-MM-DD format)
 */
export const validateDate = [
  query("date")
    .optional()
    .custom((value) => {
      if (typeof value !== "string" || !isDateOnly(value)) {
        throw new Error("Date must be a valid YYYY-MM-DD date");
      }
      return true;
    }),

  handleValidationErrors,
];

export const validateSummaryQuery = [
  query("groupBy")
    .optional()
    .isIn(["day", "week", "month"])
    .withMessage("groupBy must be one of day, week, month"),

  query("order")
    .optional()
    .isIn(["asc", "desc"])
    .withMessage("order must be asc or desc"),

  handleValidationErrors,
];
