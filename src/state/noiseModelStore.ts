// src/state/noiseModelStore.ts
import { createStore, type StoreApi } from "zustand/vanilla";
import type { Qubit } from "../../shared/protocol/CircuitTypes";
import type { GateType } from "../circuit/gates";
import type { QuantumError } from "../noise/errors";

export interface NoiseRegistration {
  error: QuantumError;
  sourceQubits?: readonly Qubit[];
  targetQubits?: readonly Qubit[];
}

/** Registration table keyed by gate type; one entry per gate type. */
export type RegistrationTable = ReadonlyMap<GateType, NoiseRegistration>;

export interface NoiseModelState {
  errors: RegistrationTable;

  register: (gate: GateType, entry: NoiseRegistration) => void;
  unregister: (gate: GateType) => boolean;
  clear: () => void;
}

export type NoiseModelStore = StoreApi<NoiseModelState>;

/**
 * A fresh store per noise model. The map is replaced on every write so a
 * table read before a registration is never changed by it.
 */
export function createNoiseModelStore(): NoiseModelStore {
  return createStore<NoiseModelState>((set, get) => ({
    errors: new Map(),

    register: (gate, entry) =>
      set((s) => {
        const next = new Map(s.errors);
        // re-registering keeps the key's first insertion slot
        next.set(gate, Object.freeze({ ...entry }));
        return { errors: next };
      }),

    unregister: (gate) => {
      if (!get().errors.has(gate)) return false;
      set((s) => {
        const next = new Map(s.errors);
        next.delete(gate);
        return { errors: next };
      });
      return true;
    },

    clear: () => set({ errors: new Map() }),
  }));
}
