import type { OrcidLog } from "../orcid/lookup";
import type { Warning } from "../reconcile/engine";
import type { ReconciliationReport } from "./builder";

export function formatWarning(warning: Warning): string {
  return `- \`${warning.subject}\`: ${warning.reason}`;
}

export function formatOrcidLog(log: OrcidLog): string {
  const resolved = log.orcid ? ` → ${log.orcid}` : "";
  const detail = log.message ? ` (${log.message})` : "";
  return `- \`${log.contributor}\`: ${log.outcome} for \`${log.query}\`${resolved}${detail}`;
}

function delimiterFor(value: string): string {
  const lines = new Set(value.split("\n"));
  let delimiter = "EOF";
  for (let n = 1; lines.has(delimiter); n++) {
    delimiter = `EOF_${n}`;
  }
  return delimiter;
}

function multiline(name: string, value: string): string {
  const body = value.replace(/\n+$/, "");
  const delimiter = delimiterFor(body);
  return `${name}<<${delimiter}\n${body}\n${delimiter}\n`;
}

/**
 * Render the report as GitHub Actions step outputs (the `GITHUB_OUTPUT`
 * file format). `warnings` and `orcid_logs` are omitted when empty.
 */
export function formatActionOutputs(report: ReconciliationReport): string {
  let out = multiline("new_authors", JSON.stringify(report.new_authors));
  out += multiline("updated_cff", report.updated_cff);
  if (report.warnings.length > 0) {
    out += multiline("warnings", report.warnings.map(formatWarning).join("\n"));
  }
  if (report.orcid_logs.length > 0) {
    out += multiline("orcid_logs", report.orcid_logs.map(formatOrcidLog).join("\n"));
  }
  return out;
}
