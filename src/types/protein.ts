/**
 * Protein record shapes handed to downstream consumers.
 */

/** Which side of a weight window a fractionation keeps. */
export type WindowSelection = "inside" | "outside";

/** Inclusive molecular-weight window in kDa. */
export interface WeightWindow {
  readonly min: number;
  readonly max: number;
}

/**
 * Plain, immutable view of a protein record.
 * This is what the visualization step receives.
 */
export interface ProteinSnapshot {
  readonly header: string;
  readonly accession: string;
  readonly sequence: string;
  readonly weight: number | null;
  readonly abundance: number;
  readonly modifications: readonly string[];
}

export type PoolSnapshot = readonly ProteinSnapshot[];
