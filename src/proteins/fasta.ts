/**
 * FASTA parsing.
 */

import { readFileSync } from "node:fs";
import { Protein } from "./protein.js";

/**
 * Parse FASTA text into header → sequence pairs, in file order.
 *
 * Headers lose their leading ">". Sequence lines are trimmed and joined.
 * Blank lines and anything before the first header are ignored. A repeated
 * header keeps its first position and takes the later sequence.
 */
export function parseFasta(content: string): Map<string, string> {
  const sequences = new Map<string, string>();
  let currentHeader: string | null = null;
  let currentSequence: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.startsWith(">")) {
      if (currentHeader !== null) {
        sequences.set(currentHeader, currentSequence.join(""));
      }
      currentHeader = line.slice(1);
      currentSequence = [];
    } else if (line.length > 0 && currentHeader !== null) {
      currentSequence.push(line);
    }
  }

  if (currentHeader !== null) {
    sequences.set(currentHeader, currentSequence.join(""));
  }

  return sequences;
}

/**
 * Read and parse a FASTA file.
 */
export function readFastaFile(filePath: string): Map<string, string> {
  return parseFasta(readFileSync(filePath, "utf-8"));
}

/**
 * Build one protein record per FASTA entry.
 */
export function proteinsFromFasta(sequences: ReadonlyMap<string, string>): Protein[] {
  return [...sequences].map(([header, sequence]) => new Protein({ header, sequence }));
}
