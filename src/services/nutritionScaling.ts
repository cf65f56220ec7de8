// src/services/nutritionScaling.ts
import { ScaledTotals, ServingInput } from "../domain/types";

/**
 * Ratio of the weighed portion to the reference serving.
 * A serving size of zero or less gives 0 instead of dividing by it: the add-meal
 * form can hold such a value while the user is still typing.
 */
export function scaleFactor(weightGrams: number, servingSizeGrams: number): number {
  return servingSizeGrams > 0 ? weightGrams / servingSizeGrams : 0;
}

export function scaleNutrient(
  weightGrams: number,
  servingSizeGrams: number,
  perServing: number
): number {
  return scaleFactor(weightGrams, servingSizeGrams) * perServing;
}

/**
 * Absolute calories and protein for the portion eaten. Values are not rounded;
 * callers format them for display.
 */
export function computeMealTotals(input: ServingInput): ScaledTotals {
  const factor = scaleFactor(input.weightGrams, input.servingSizeGrams);
  return {
    scaleFactor: factor,
    caloriesTotal: factor * input.caloriesPerServing,
    proteinGramsTotal: factor * input.proteinGramsPerServing,
  };
}
