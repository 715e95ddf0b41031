import { parseArgs } from "../lib/cli-args";
import { closeDb, loadSalaries, loadTeams } from "../lib/db";
import { writeOutputs } from "../lib/outputs";
import { runSalaryPipeline } from "../lib/pipeline";
import { runReferencePipeline } from "../lib/salaries/reference";

async function main() {
  const args = parseArgs(process.argv.slice(2));

  // Both pipelines finish before anything is written.
  const [result, teams] = await Promise.all([
    runSalaryPipeline({
      indexUrl: args.indexUrl,
      skipRows: args.skipRows,
      concurrency: args.concurrency,
      failFast: args.failFast,
    }),
    args.referenceUrl ? runReferencePipeline(args.referenceUrl) : Promise.resolve(null),
  ]);

  writeOutputs(args.outDir, result.dataset, teams);

  if (args.loadDb) {
    loadSalaries(result.dataset);
    if (teams) loadTeams(teams);
    closeDb();
  }

  console.log(`\n=== Summary ===`);
  console.log(`Teams: ${result.sources.length}`);
  console.log(`Rows: ${result.dataset.length}`);
  console.log(`Names replaced: ${result.rejections.length}`);
  console.log(`Failed: ${result.failures.length}`);
  for (const f of result.failures) {
    console.log(`  - ${f.sourceId ?? f.url}: ${f.error}`);
  }

  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  closeDb();
  process.exit(1);
});
