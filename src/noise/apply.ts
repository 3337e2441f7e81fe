import type { GateModel, Qubit } from "../../shared/protocol/CircuitTypes";
import { Circuit } from "../circuit/Circuit";
import { intersectQubits } from "../circuit/qubits";
import type { BothFiltersPolicy } from "../config";
import type { NoiseRegistration, RegistrationTable } from "../state/noiseModelStore";

export interface ApplyNoiseOptions {
  bothFiltersPolicy?: BothFiltersPolicy;
}

export interface ApplyNoiseResult {
  circuit: Circuit;
  injected: number;
}

/**
 * Qubits that receive a channel after gate `g`.
 *
 * No filter: every distinct qubit `g` acts on, in `g`'s order. Target only: the target
 * filter. Source only: `g.qbits ∩ source`. Both: the target filter; under the
 * `"gated"` policy only when `g.qbits ∩ source` is non-empty.
 */
export function noiseQubits(
  g: GateModel,
  entry: NoiseRegistration,
  policy: BothFiltersPolicy = "target",
): readonly Qubit[] {
  const { sourceQubits: source, targetQubits: target } = entry;
  if (source === undefined) return target ?? Array.from(new Set(g.qbits));
  if (target === undefined) return intersectQubits(g.qbits, source);

  // Both set: the default uses the target even when the gate touches no
  // source qubit. "gated" skips that case.
  const touched = intersectQubits(g.qbits, source);
  if (policy === "gated" && touched.length === 0) return [];
  return target;
}

/** Builds a new circuit with a channel gate appended after every registered gate. */
export function applyNoiseDetailed(
  table: RegistrationTable,
  circuit: Circuit,
  options: ApplyNoiseOptions = {},
): ApplyNoiseResult {
  const policy = options.bothFiltersPolicy ?? "target";
  const noisy = Circuit.fromInit(circuit.init);
  let injected = 0;

  for (const g of circuit.queue) {
    noisy.add(g);
    const entry = table.get(g.name);
    if (!entry) continue;
    for (const q of noiseQubits(g, entry, policy)) {
      noisy.add(entry.error.realize(q));
      injected += 1;
    }
  }

  noisy.parametrizedGates = [...circuit.parametrizedGates];
  noisy.trainableGates = [...circuit.trainableGates];
  noisy.measurementTuples = { ...circuit.measurementTuples };
  noisy.measurementGate = circuit.measurementGate;
  return { circuit: noisy, injected };
}

export function applyNoise(table: RegistrationTable, circuit: Circuit, options: ApplyNoiseOptions = {}): Circuit {
  return applyNoiseDetailed(table, circuit, options).circuit;
}
