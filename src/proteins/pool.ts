/**
 * Protein pool.
 *
 * The mutable collection of protein records one pipeline run works on.
 * Each run owns its own pool; modules clear, fill and filter it in turn.
 * Records keep insertion order and duplicates are allowed.
 */

import { Protein } from "./protein.js";
import type { PoolSnapshot, WindowSelection } from "../types/protein.js";

export class ProteinPool {
  private proteins: Protein[] = [];

  constructor(initial: Iterable<Protein> = []) {
    this.proteins = [...initial];
  }

  get size(): number {
    return this.proteins.length;
  }

  /**
   * Remove every record.
   */
  clearAll(): void {
    this.proteins = [];
  }

  add(protein: Protein): void {
    this.proteins.push(protein);
  }

  addAll(proteins: Iterable<Protein>): void {
    for (const protein of proteins) {
      this.proteins.push(protein);
    }
  }

  /**
   * Current records in insertion order. The array is a copy; the records are live.
   */
  getAll(): readonly Protein[] {
    return [...this.proteins];
  }

  /**
   * Fractionate in place by molecular weight, bounds inclusive.
   * "inside" keeps records in [min, max], "outside" keeps the rest.
   * Records of unknown weight are dropped by either selection.
   *
   * @returns Number of records removed
   */
  filterByWeightWindow(selection: WindowSelection, min: number, max: number): number {
    const before = this.proteins.length;
    this.proteins = this.proteins.filter((protein) => {
      if (protein.weight === null) {
        return false;
      }
      const inside = protein.isWithinWeight(min, max);
      return selection === "inside" ? inside : !inside;
    });
    return before - this.proteins.length;
  }

  /**
   * Append a provenance note to every record.
   */
  annotateAll(note: string): void {
    for (const protein of this.proteins) {
      protein.addModification(note);
    }
  }

  snapshot(): PoolSnapshot {
    return Object.freeze(this.proteins.map((protein) => protein.toSnapshot()));
  }
}
