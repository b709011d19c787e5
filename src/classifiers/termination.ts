/**
 * Termination policy: only "yes" and "no" are valid verdicts.
 */
import { TerminationContractViolation } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { TerminationDecision, Verdict } from './types.js';

/**
 * Normalize a termination verdict (trim, lower-case).
 * `yes` stops the round, `no` continues it, anything else is a violation.
 */
export function resolveTermination(
  verdict: Verdict,
): Result<TerminationDecision, TerminationContractViolation> {
  const normalized = verdict.verdict.trim().toLowerCase();
  if (normalized === 'yes') return ok('stop');
  if (normalized === 'no') return ok('continue');
  return err(new TerminationContractViolation(verdict.verdict));
}
