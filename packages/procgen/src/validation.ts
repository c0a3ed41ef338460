/**
 * Level Validation
 *
 * Public facade for validation utilities.
 * For determinism checks, see testing.ts.
 */

export {
  errorMessages,
  hasErrorViolations,
  type ValidationFailure,
  type ValidationReport,
  type ValidationSuccess,
  type Violation,
} from "./validation/result-types";
export { validateLevel } from "./validation/validate-level";
