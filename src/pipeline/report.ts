/**
 * Plain-text rendering of a pipeline report.
 */

import type { PipelineReport } from "../types/pipeline.js";
import type { ProteinSnapshot } from "../types/protein.js";

function formatWeight(weight: number | null): string {
  return weight === null ? "unknown" : `${weight.toFixed(2)} kDa`;
}

function formatProtein(protein: ProteinSnapshot): string {
  const notes = protein.modifications.length > 0 ? ` [${protein.modifications.join("; ")}]` : "";
  return `      ${protein.accession}  ${formatWeight(protein.weight)}  AB=${protein.abundance}${notes}`;
}

/**
 * One block per stage: module, chosen label, surviving proteins.
 */
export function formatPipelineReport(report: PipelineReport, verbose = false): string {
  const lines = [`Pipeline ${report.pipelineId} (run ${report.runId})`];

  report.stages.forEach((stage, index) => {
    const label = stage.selectedLabel === null ? "" : ` -> ${stage.selectedLabel}`;
    lines.push(
      `  ${index + 1}. ${stage.instanceId} [${stage.moduleId}]${label}: ${stage.proteins.length} protein(s)`
    );
    if (verbose) {
      lines.push(...stage.proteins.map(formatProtein));
    }
  });

  return lines.join("\n");
}
