import path from "path";
import { serializeDataset, writeArtifacts, type Artifact } from "./salaries/dataset";
import { serializeReference } from "./salaries/reference";
import type { Dataset, ReferenceEntry } from "./types";

export const SALARIES_FILE = "salaries.csv";
export const TEAMS_FILE = "teams.csv";

/**
 * Serialize the run's artifacts and write them to `outDir` together:
 * `salaries.csv`, plus `teams.csv` when reference data was fetched. Either
 * both files are written or neither is. Returns the written paths.
 */
export function writeOutputs(
  outDir: string,
  dataset: Dataset,
  teams: ReferenceEntry[] | null
): string[] {
  const artifacts: Artifact[] = [
    { destination: path.join(outDir, SALARIES_FILE), content: serializeDataset(dataset) },
  ];
  if (teams) {
    artifacts.push({ destination: path.join(outDir, TEAMS_FILE), content: serializeReference(teams) });
  }

  writeArtifacts(artifacts);
  console.log(`[export] Wrote ${dataset.length} salary rows to ${artifacts[0].destination}`);
  if (teams) console.log(`[export] Wrote ${teams.length} teams to ${artifacts[1].destination}`);
  return artifacts.map((a) => a.destination);
}
