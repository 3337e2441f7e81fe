import type { Circuit } from "../circuit/Circuit";
import type { GateType } from "../circuit/gates";
import { qubitSet, type QubitsArg } from "../circuit/qubits";
import { getConfig, type BothFiltersPolicy } from "../config";
import { logNoise } from "../state/logStore";
import {
  createNoiseModelStore,
  type NoiseModelStore,
  type NoiseRegistration,
  type RegistrationTable,
} from "../state/noiseModelStore";
import { isNoiseError } from "../utils/errorCatalog";
import { formatQubits } from "../utils/formatter";
import {
  noiseModelFromSnapshot,
  noiseModelToSnapshot,
  type NoiseModelSnapshotV1,
} from "../utils/snapshots";
import { applyNoiseDetailed } from "./apply";
import type { QuantumError } from "./errors";

export interface NoiseModelOptions {
  name?: string;
  /** Falls back to the live configuration when omitted. */
  bothFiltersPolicy?: BothFiltersPolicy;
}

/**
 * Custom noise model: binds quantum errors to gate types and produces noisy
 * circuits from noiseless ones.
 *
 * @example
 * const noise = new NoiseModel();
 * noise.add(pauliError({ px: 0.5 }), "H", 1);
 * noise.add(pauliError({ py: 0.5 }), "CNOT");
 *
 * const c = new Circuit(2);
 * c.add([H(0), H(1), CNOT(0, 1)]);
 * const noisy = noise.apply(c);
 */
export class NoiseModel {
  readonly name: string;
  private readonly store: NoiseModelStore;
  private readonly policy?: BothFiltersPolicy;

  constructor(options: NoiseModelOptions = {}) {
    this.name = options.name ?? "noise-model";
    this.policy = options.bothFiltersPolicy;
    this.store = createNoiseModelStore();
  }

  /**
   * Adds a quantum error after every instance of `gate`.
   *
   * `sourceQubits` limits injection to gates touching those qubits (and only
   * on them); `targetQubits` picks the qubits that receive the channel. Either
   * takes a single qubit or a collection. A second call for the same gate
   * replaces the first.
   */
  add(error: QuantumError, gate: GateType, sourceQubits?: QubitsArg, targetQubits?: QubitsArg): void {
    const entry: NoiseRegistration = { error };
    try {
      if (sourceQubits !== undefined) entry.sourceQubits = qubitSet(sourceQubits);
      if (targetQubits !== undefined) entry.targetQubits = qubitSet(targetQubits);
    } catch (e) {
      this.logFailure(`failed to add ${error.kind} error on ${gate}`, e);
      throw e;
    }

    const replaced = this.store.getState().errors.has(gate);
    this.store.getState().register(gate, entry);
    logNoise(`${replaced ? "replaced" : "added"} ${error.kind} error on ${gate}`, "debug", {
      model: this.name,
      source: entry.sourceQubits ? formatQubits(entry.sourceQubits) : null,
      target: entry.targetQubits ? formatQubits(entry.targetQubits) : null,
    });
  }

  lookup(gate: GateType): NoiseRegistration | undefined {
    return this.store.getState().errors.get(gate);
  }

  remove(gate: GateType): boolean {
    const removed = this.store.getState().unregister(gate);
    if (removed) logNoise(`removed error on ${gate}`, "debug", { model: this.name });
    return removed;
  }

  clear(): void {
    this.store.getState().clear();
  }

  /** Registered gate types in first-registration order. */
  gates(): GateType[] {
    return Array.from(this.store.getState().errors.keys());
  }

  get size(): number {
    return this.store.getState().errors.size;
  }

  get table(): RegistrationTable {
    return this.store.getState().errors;
  }

  get bothFiltersPolicy(): BothFiltersPolicy {
    return this.policy ?? getConfig().bothFiltersPolicy;
  }

  /** New circuit equal to `circuit` with noise channels added after registered gates. */
  apply(circuit: Circuit): Circuit {
    try {
      const { circuit: noisy, injected } = applyNoiseDetailed(this.table, circuit, {
        bothFiltersPolicy: this.bothFiltersPolicy,
      });
      logNoise(`applied ${this.name}: ${circuit.ngates} gates, ${injected} channels injected`, "info");
      return noisy;
    } catch (e) {
      this.logFailure(`failed to apply ${this.name}`, e);
      throw e;
    }
  }

  private logFailure(what: string, e: unknown): void {
    const detail = e instanceof Error ? e.message : String(e);
    logNoise(`${what}: ${detail}`, "error", isNoiseError(e) ? { model: this.name, code: e.code } : { model: this.name });
  }

  toSnapshot(): NoiseModelSnapshotV1 {
    return noiseModelToSnapshot(this.name, this.table);
  }

  static fromSnapshot(snapshot: NoiseModelSnapshotV1, options: Omit<NoiseModelOptions, "name"> = {}): NoiseModel {
    const model = new NoiseModel({ ...options, name: snapshot.name });
    for (const e of noiseModelFromSnapshot(snapshot)) {
      model.add(e.error, e.gate, e.sourceQubits, e.targetQubits);
    }
    return model;
  }
}
