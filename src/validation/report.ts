import { ValidationResult, ViolationKind, VIOLATION_KINDS } from '../types/validation';

export const ROOT_LABEL = '(root)';

export interface ValidationSummary {
  source: string;
  valid: boolean;
  violationCount: number;
  counts: Partial<Record<ViolationKind, number>>;
  violations: Array<{ path: string; kind: ViolationKind; message: string }>;
}

/**
 * One display line per violation: `<path>: [<kind>] <message>`
 */
export function formatViolations(result: ValidationResult): string[] {
  return result.violations.map(
    (violation) => `${violation.path || ROOT_LABEL}: [${violation.kind}] ${violation.message}`
  );
}

export function summarizeResult(source: string, result: ValidationResult): ValidationSummary {
  const counts: Partial<Record<ViolationKind, number>> = {};
  for (const kind of VIOLATION_KINDS) {
    const count = result.violations.filter((violation) => violation.kind === kind).length;
    if (count > 0) {
      counts[kind] = count;
    }
  }

  return {
    source,
    valid: result.valid,
    violationCount: result.violations.length,
    counts,
    violations: result.violations.map(({ path, kind, message }) => ({ path, kind, message })),
  };
}
