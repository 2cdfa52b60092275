import type { ReconcileResult } from "./engine";

export interface ValidityVerdict {
  passed: boolean;
  /** Keys of the contributors causing the failure, in processing order. */
  blockingContributors: string[];
}

/**
 * Only contributors that could not be turned into an author record block
 * the pull request; new authors are added automatically and never do.
 */
export function decideValidity(
  result: Pick<ReconcileResult, "unmatched">,
  missingAuthorInvalidatesPr: boolean,
): ValidityVerdict {
  if (!missingAuthorInvalidatesPr) {
    return { passed: true, blockingContributors: [] };
  }

  const blockingContributors = result.unmatched.map((u) => u.contributor.key);
  return { passed: blockingContributors.length === 0, blockingContributors };
}
