import { z } from "zod";

const UINT32_MAX = 0xffffffff;
const NonNegativeIntSchema = z
  .number()
  .int()
  .min(0, { error: "Seed values must be non-negative integers" })
  .max(UINT32_MAX, { error: "Seed values must fit in uint32" });

export const LevelSeedSchema = z.object({
  primary: NonNegativeIntSchema,
  walk: NonNegativeIntSchema,
  placement: NonNegativeIntSchema,
  version: z
    .string()
    .regex(/^\d+\.\d+\.\d+$/, { error: "Invalid version format" }),
});
