import { isFatalError } from "./errors";
import { runFromEnv } from "./run";

async function main(): Promise<void> {
  const { report } = await runFromEnv(process.env);

  console.log(
    `${report.new_authors.length} new author(s), ${report.unmatched.length} unmatched, ${report.warnings.length} warning(s)`,
  );

  if (!report.verdict.passed) {
    console.error(
      `Pull request invalid: missing author metadata for ${report.verdict.blockingContributors.join(", ")}`,
    );
    process.exitCode = 1;
  }
}

main().catch((err) => {
  if (isFatalError(err)) {
    console.error(`Fatal: ${err.message}`);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
