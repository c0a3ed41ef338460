import { z } from "zod";

/** Largest supported stamp radius (7x7 square) */
export const MAX_STAMP_SIZE = 3;

const PositiveIntSchema = (field: string) =>
  z
    .number()
    .int({ error: `${field} must be an integer` })
    .positive({ error: `${field} must be positive` });

export const CoordinateSchema = z.object({
  x: z.number().int({ error: "Coordinates must be integers" }),
  y: z.number().int({ error: "Coordinates must be integers" }),
});

export const WalkConfigSchema = z.object({
  walkSteps: PositiveIntSchema("walkSteps"),
  stampSize: z
    .number()
    .int({ error: "stampSize must be an integer" })
    .min(0, { error: `stampSize must be between 0 and ${MAX_STAMP_SIZE}` })
    .max(MAX_STAMP_SIZE, {
      error: `stampSize must be between 0 and ${MAX_STAMP_SIZE}`,
    }),
  minFloorTiles: PositiveIntSchema("minFloorTiles"),
  maxGenerationAttempts: PositiveIntSchema("maxGenerationAttempts"),
  startPosition: CoordinateSchema,
});

export type ValidatedWalkConfig = z.infer<typeof WalkConfigSchema>;
