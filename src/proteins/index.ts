/**
 * Protein records, the per-run protein pool, and FASTA input.
 */

export {
  Protein,
  computeMolecularWeight,
  parseAbundance,
  parseAccession,
  type ProteinInit,
} from "./protein.js";
export { ProteinPool } from "./pool.js";
export { parseFasta, readFastaFile, proteinsFromFasta } from "./fasta.js";
