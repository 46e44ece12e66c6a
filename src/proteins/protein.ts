/**
 * Protein records.
 *
 * A record is created from one FASTA entry. Its molecular weight is derived
 * from the sequence and its abundance from an `AB=<value>` tag in the
 * header. Downstream modules append provenance notes to `modifications`;
 * notes are never removed.
 */

import type { ProteinSnapshot } from "../types/protein.js";

/**
 * Average residue masses in Da (residue = amino acid minus water).
 */
const RESIDUE_MASSES: Readonly<Record<string, number>> = {
  A: 71.0788,
  R: 156.1875,
  N: 114.1038,
  D: 115.0886,
  C: 103.1388,
  E: 129.1155,
  Q: 128.1307,
  G: 57.0519,
  H: 137.1411,
  I: 113.1594,
  L: 113.1594,
  K: 128.1741,
  M: 131.1926,
  F: 147.1766,
  P: 97.1167,
  S: 87.0782,
  T: 101.1051,
  W: 186.2132,
  Y: 163.176,
  V: 99.1326,
  U: 150.0388,
  O: 237.3018,
};

const WATER_MASS = 18.01528;

const ABUNDANCE_TAG = /(?:^|\s)AB=(\S+)/;

/**
 * Molecular weight of a sequence in kDa, or null when it is empty or holds
 * a residue with no known mass (X, B, Z, gaps).
 * A trailing stop symbol is ignored.
 */
export function computeMolecularWeight(sequence: string): number | null {
  const residues = sequence.trim().toUpperCase().replace(/\*$/, "");
  if (residues.length === 0) {
    return null;
  }

  let mass = WATER_MASS;
  for (const residue of residues) {
    const residueMass = RESIDUE_MASSES[residue];
    if (residueMass === undefined) {
      return null;
    }
    mass += residueMass;
  }
  return mass / 1000;
}

/**
 * Abundance recorded in a header's `AB=` tag; 0 when absent, negative or unreadable.
 */
export function parseAbundance(header: string): number {
  const match = ABUNDANCE_TAG.exec(header);
  if (!match?.[1]) {
    return 0;
  }
  const value = Number(match[1]);
  return Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Accession of a FASTA header: the second field of a UniProt
 * `db|ACCESSION|ENTRY` header, otherwise the first token.
 */
export function parseAccession(header: string): string {
  const firstToken = header.trim().split(/\s+/)[0] ?? "";
  const fields = firstToken.split("|");
  if (fields.length >= 3 && fields[1]) {
    return fields[1];
  }
  return firstToken;
}

export interface ProteinInit {
  header: string;
  sequence: string;
  /** Overrides the sequence-derived weight (kDa); null marks it unknown */
  weight?: number | null;
  /** Overrides the header-derived abundance */
  abundance?: number;
}

export class Protein {
  readonly header: string;
  readonly accession: string;
  readonly sequence: string;
  readonly weight: number | null;
  readonly abundance: number;
  private readonly _modifications: string[] = [];

  constructor(init: ProteinInit) {
    this.header = init.header;
    this.accession = parseAccession(init.header);
    this.sequence = init.sequence;
    this.weight = init.weight !== undefined ? init.weight : computeMolecularWeight(init.sequence);
    this.abundance = init.abundance ?? parseAbundance(init.header);
  }

  get modifications(): readonly string[] {
    return this._modifications;
  }

  addModification(note: string): void {
    this._modifications.push(note);
  }

  /**
   * Whether the weight is known and lies in [min, max].
   */
  isWithinWeight(min: number, max: number): boolean {
    return this.weight !== null && this.weight >= min && this.weight <= max;
  }

  toSnapshot(): ProteinSnapshot {
    return Object.freeze({
      header: this.header,
      accession: this.accession,
      sequence: this.sequence,
      weight: this.weight,
      abundance: this.abundance,
      modifications: Object.freeze([...this._modifications]),
    });
  }
}
