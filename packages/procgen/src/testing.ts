/**
 * Test helpers for callers of the generator.
 * Lives outside validation.ts because it runs the generation API.
 */

import { LevelError } from "@stampwalk/contracts";
import { generate } from "./api";
import type { LevelGenerationConfig } from "./config";

/**
 * One seeded run as seen by `assertDeterministic`.
 */
export interface RunFingerprint {
  readonly checksum: string;
  readonly attempts: number;
}

function sameRun(a: RunFingerprint, b: RunFingerprint): boolean {
  return a.checksum === b.checksum && a.attempts === b.attempts;
}

export class DeterminismViolationError extends Error {
  constructor(
    public readonly runs: readonly RunFingerprint[],
    public readonly config: LevelGenerationConfig,
  ) {
    super(
      `Non-deterministic generation detected: produced ${new Set(runs.map((r) => r.checksum)).size} different checksums for the same seed`,
    );
    this.name = "DeterminismViolationError";
  }
}

/**
 * Generate the same seeded config `runs` times and require identical
 * levels reached in the same number of attempts.
 *
 * @throws {LevelError} when the config has no seed or a run fails
 * @throws {DeterminismViolationError}
 *
 * @example
 * ```typescript
 * it("walk is reproducible", () => {
 *   assertDeterministic({ walkSteps: 300, seed: 12345 });
 * });
 * ```
 */
export function assertDeterministic(
  config: LevelGenerationConfig,
  runs: number = 3,
): void {
  if (config.seed === undefined) {
    throw LevelError.configInvalid("assertDeterministic needs a seeded config");
  }

  const fingerprints: RunFingerprint[] = [];
  for (let i = 0; i < runs; i++) {
    const result = generate(config);
    if (!result.success) throw result.error;
    fingerprints.push({
      checksum: result.level.checksum,
      attempts: result.attempts,
    });
  }

  const [first] = fingerprints;
  if (first && !fingerprints.every((run) => sameRun(run, first))) {
    throw new DeterminismViolationError(fingerprints, config);
  }
}
