import type { Qubit } from "../../shared/protocol/CircuitTypes";
import { NoiseErrors } from "../utils/errorCatalog";

/** A single qubit or any collection of qubits. */
export type QubitsArg = Qubit | Iterable<Qubit>;

export function isQubit(value: unknown): value is Qubit {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

export function toQubit(value: unknown): Qubit {
  if (!isQubit(value)) throw NoiseErrors.typeMismatch(value);
  return value;
}

const ascending = (a: number, b: number) => a - b;

/**
 * Normalises a qubit argument into a set: deduplicated, ascending.
 * A bare number becomes a one-element set.
 */
export function qubitSet(arg: QubitsArg): Qubit[] {
  const values: unknown[] = typeof arg === "number" ? [arg] : Array.from(arg);
  return Array.from(new Set(values.map(toQubit))).sort(ascending);
}

/** Qubits present in both `qbits` and `filter`, ascending. */
export function intersectQubits(qbits: readonly Qubit[], filter: readonly Qubit[]): Qubit[] {
  const allowed = new Set(filter.map(toQubit));
  return Array.from(new Set(qbits.map(toQubit)))
    .filter((q) => allowed.has(q))
    .sort(ascending);
}
