import type { ContributionCategory } from "../events/types";
import type { EvidenceEntry, NewAuthorEntry, ReconciliationReport } from "./builder";
import { formatOrcidLog, formatWarning } from "./outputs";

const CATEGORY_LABELS: Record<ContributionCategory, string> = {
  commits: "Commit",
  pr_comments: "Pull Request Comment",
  reviews: "Review",
  issues: "Issue",
  issue_comments: "Issue Comment",
};

export interface CommentOptions {
  cffPath: string;
  baseBranch: string;
  headBranch: string;
}

function describeContribution(evidence: EvidenceEntry): string {
  const label = CATEGORY_LABELS[evidence.category];
  if (evidence.category === "commits") {
    const short = `\`${evidence.ref.slice(0, 7)}\``;
    return evidence.url ? `${label}: [${short}](${evidence.url})` : `${label}: ${short}`;
  }
  return evidence.url ? `[${label}](${evidence.url})` : `${label} ${evidence.ref}`;
}

function describeNewAuthor(entry: NewAuthorEntry): string {
  const first = entry.evidence.find((e) => e.category === entry.category) ?? entry.evidence[0];
  return `- \`${entry.contributor}\`: ${describeContribution(first)}`;
}

/**
 * Markdown body for the pull request comment.
 */
export function renderComment(report: ReconciliationReport, options: CommentOptions): string {
  const sections: string[] = [
    "### Citation authors check",
    `Contributions on \`${options.headBranch}\` compared with \`${options.baseBranch}\`.`,
  ];

  if (report.verdict.passed) {
    sections.push("**Passed**: every qualifying contributor is or can be listed as an author.");
  } else {
    const blocking = report.verdict.blockingContributors.map((key) => `\`${key}\``).join(", ");
    sections.push(`**Failed**: not enough metadata to add ${blocking} to \`${options.cffPath}\`.`);
  }

  if (report.new_authors.length > 0) {
    sections.push(
      [
        `New authors to add to \`${options.cffPath}\`:`,
        ...report.new_authors.map(describeNewAuthor),
      ].join("\n"),
    );
  } else {
    sections.push(`No new authors for \`${options.cffPath}\`.`);
  }

  if (report.unmatched.length > 0) {
    sections.push(
      [
        "Contributors that could not be added:",
        ...report.unmatched.map((u) => `- \`${u.contributor}\`: ${u.reason}`),
      ].join("\n"),
    );
  }

  if (report.warnings.length > 0) {
    sections.push(["**Warnings**", ...report.warnings.map(formatWarning)].join("\n"));
  }

  if (report.orcid_logs.length > 0) {
    sections.push(
      [
        "<details><summary>ORCID lookups</summary>",
        "",
        ...report.orcid_logs.map(formatOrcidLog),
        "",
        "</details>",
      ].join("\n"),
    );
  }

  if (report.new_authors.length > 0) {
    sections.push(
      [
        `<details><summary>Updated ${options.cffPath}</summary>`,
        "",
        "```yaml",
        report.updated_cff.replace(/\n+$/, ""),
        "```",
        "",
        "</details>",
      ].join("\n"),
    );
  }

  return sections.join("\n\n") + "\n";
}
