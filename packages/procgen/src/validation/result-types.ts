/**
 * A single problem found while validating a config or a level.
 */
export interface Violation {
  readonly type: string;
  readonly message: string;
  readonly severity: "error" | "warning";
}

/**
 * Successful validation result.
 * May still contain warnings, but no errors.
 */
export interface ValidationSuccess {
  readonly success: true;
  readonly violations: readonly Violation[];
}

/**
 * Failed validation result.
 * Contains at least one error-level violation.
 */
export interface ValidationFailure {
  readonly success: false;
  readonly violations: readonly Violation[];
}

/**
 * Use `if (report.success)` to narrow.
 */
export type ValidationReport = ValidationSuccess | ValidationFailure;

export function hasErrorViolations(violations: readonly Violation[]): boolean {
  return violations.some((violation) => violation.severity === "error");
}

export function toValidationReport(
  violations: readonly Violation[],
): ValidationReport {
  if (hasErrorViolations(violations)) {
    return { success: false, violations };
  }
  return { success: true, violations };
}

export function errorMessages(violations: readonly Violation[]): string[] {
  return violations
    .filter((v) => v.severity === "error")
    .map((v) => v.message);
}
