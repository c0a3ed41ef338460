import { LevelSeedSchema } from "../schemas/seed";
import {
  type ValidatedWalkConfig,
  WalkConfigSchema,
} from "../schemas/walk-config";
import { LevelError } from "../types/error";
import type { LevelSeed } from "../types/level";
import { Err, Ok, type Result } from "../types/result";

function describeIssues(
  issues: readonly { path: readonly PropertyKey[]; message: string }[],
): string[] {
  return issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.map(String).join(".")}: ${issue.message}`
      : issue.message,
  );
}

/**
 * Parse untrusted input (JSON, query params, editor state) into a walk
 * configuration. Nothing is clamped: any out-of-range value is an error.
 */
export function parseWalkConfig(
  input: unknown,
): Result<ValidatedWalkConfig, LevelError> {
  const parsed = WalkConfigSchema.safeParse(input);
  if (!parsed.success) {
    const problems = describeIssues(parsed.error.issues);
    return Err(
      LevelError.configInvalid(`Invalid configuration: ${problems.join("; ")}`, {
        problems,
      }),
    );
  }
  return Ok(parsed.data);
}

export function parseLevelSeed(input: unknown): Result<LevelSeed, LevelError> {
  const parsed = LevelSeedSchema.safeParse(input);
  if (!parsed.success) {
    const problems = describeIssues(parsed.error.issues);
    return Err(
      new LevelError("SEED_INVALID", `Invalid seed: ${problems.join("; ")}`, {
        problems,
      }),
    );
  }
  return Ok(parsed.data);
}
