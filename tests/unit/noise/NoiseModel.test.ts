import { beforeEach, describe, expect, it } from "vitest";
import { Circuit } from "@/circuit/Circuit";
import { CNOT, H, M, RX, RY, X, gate } from "@/circuit/gates";
import { configure, resetConfig } from "@/config";
import { NoiseModel } from "@/noise/NoiseModel";
import { pauliError, resetError, thermalRelaxationError } from "@/noise/errors";
import { logStore } from "@/state/logStore";
import { NE, isNoiseError } from "@/utils/errorCatalog";
import { formatGate } from "@/utils/formatter";

const names = (c: Circuit) => c.queue.map(formatGate);

describe("NoiseModel", () => {
  beforeEach(() => {
    resetConfig();
    logStore.getState().clear();
  });

  it("adds a channel after every gate of a registered type", () => {
    const noise = new NoiseModel();
    noise.add(pauliError({ px: 0.5 }), "H");
    noise.add(pauliError({ py: 0.5 }), "CNOT");

    const c = new Circuit(2);
    c.add([H(0), H(1), CNOT(0, 1)]);
    const noisy = noise.apply(c);

    expect(names(noisy)).toEqual([
      "H(0)",
      "PauliNoiseChannel(0; px=0.5, py=0, pz=0)",
      "H(1)",
      "PauliNoiseChannel(1; px=0.5, py=0, pz=0)",
      "CNOT(0,1)",
      "PauliNoiseChannel(0; px=0, py=0.5, pz=0)",
      "PauliNoiseChannel(1; px=0, py=0.5, pz=0)",
    ]);
  });

  it("keeps the original gate objects and leaves the input circuit untouched", () => {
    const noise = new NoiseModel();
    noise.add(pauliError({ pz: 0.1 }), "H");

    const c = new Circuit(2);
    c.add([H(0), X(1)]);
    const noisy = noise.apply(c);

    expect(noisy).not.toBe(c);
    expect(noisy.queue[0]).toBe(c.queue[0]);
    expect(noisy.queue[2]).toBe(c.queue[1]);
    expect(c.queue).toHaveLength(2);
    expect(noisy.queue).toHaveLength(3);
  });

  it("passes every gate through when nothing is registered", () => {
    const c = new Circuit(3);
    c.add([H(0), CNOT(0, 2), X(1)]);
    const noisy = new NoiseModel().apply(c);

    expect(noisy.queue).toEqual(c.queue);
    expect(noisy.nqubits).toBe(3);
  });

  it("injects on the gate's own qubits in the gate's order when no filter is set", () => {
    const noise = new NoiseModel();
    noise.add(resetError({ p0: 0.2 }), "CNOT");

    const c = new Circuit(2);
    c.add(CNOT(1, 0));

    expect(names(noise.apply(c)).slice(1)).toEqual([
      "ResetChannel(1; p0=0.2, p1=0)",
      "ResetChannel(0; p0=0.2, p1=0)",
    ]);
  });

  it("injects only on source qubits the gate touches", () => {
    const noise = new NoiseModel();
    noise.add(pauliError({ px: 0.5 }), "H", 1);

    const c = new Circuit(2);
    c.add([H(0), H(1)]);

    expect(names(noise.apply(c))).toEqual(["H(0)", "H(1)", "PauliNoiseChannel(1; px=0.5, py=0, pz=0)"]);
  });

  it("orders a source intersection ascending", () => {
    const noise = new NoiseModel();
    noise.add(pauliError({ px: 0.1 }), "CNOT", [1, 0]);

    const c = new Circuit(2);
    c.add(CNOT(1, 0));

    expect(noise.apply(c).queue.slice(1).map((g) => g.qbits)).toEqual([[0], [1]]);
  });

  it("injects exactly on the target filter regardless of the gate's qubits", () => {
    const noise = new NoiseModel();
    noise.add(pauliError({ pz: 0.3 }), "H", undefined, [2, 0]);

    const c = new Circuit(3);
    c.add(H(1));

    expect(noise.apply(c).queue.slice(1).map((g) => g.qbits)).toEqual([[0], [2]]);
  });

  it("uses the target filter when both filters are set, even if the source misses", () => {
    const noise = new NoiseModel();
    noise.add(pauliError({ px: 0.1 }), "CNOT", 0, [2, 1]);

    const c = new Circuit(3);
    c.add([CNOT(1, 2), CNOT(0, 1)]);

    expect(names(noise.apply(c))).toEqual([
      "CNOT(1,2)",
      "PauliNoiseChannel(1; px=0.1, py=0, pz=0)",
      "PauliNoiseChannel(2; px=0.1, py=0, pz=0)",
      "CNOT(0,1)",
      "PauliNoiseChannel(1; px=0.1, py=0, pz=0)",
      "PauliNoiseChannel(2; px=0.1, py=0, pz=0)",
    ]);
  });

  it("skips a gate missing the source filter under the gated policy", () => {
    const noise = new NoiseModel({ bothFiltersPolicy: "gated" });
    noise.add(pauliError({ px: 0.1 }), "CNOT", 0, [2, 1]);

    const c = new Circuit(3);
    c.add([CNOT(1, 2), CNOT(0, 1)]);

    expect(names(noise.apply(c))).toEqual([
      "CNOT(1,2)",
      "CNOT(0,1)",
      "PauliNoiseChannel(1; px=0.1, py=0, pz=0)",
      "PauliNoiseChannel(2; px=0.1, py=0, pz=0)",
    ]);
  });

  it("follows the configured policy when none is given", () => {
    const noise = new NoiseModel();
    expect(noise.bothFiltersPolicy).toBe("target");
    configure({ bothFiltersPolicy: "gated" });
    expect(noise.bothFiltersPolicy).toBe("gated");
    expect(new NoiseModel({ bothFiltersPolicy: "target" }).bothFiltersPolicy).toBe("target");
  });

  it("replaces an earlier registration for the same gate", () => {
    const noise = new NoiseModel();
    noise.add(pauliError({ px: 0.5 }), "H", 0);
    noise.add(resetError({ p1: 0.3 }), "H");

    expect(noise.size).toBe(1);
    expect(noise.lookup("H")?.error.kind).toBe("reset");
    expect(noise.lookup("H")?.sourceQubits).toBeUndefined();

    const c = new Circuit(1);
    c.add(H(0));
    expect(names(noise.apply(c))).toEqual(["H(0)", "ResetChannel(0; p0=0, p1=0.3)"]);
  });

  it("accepts any gate name as a key", () => {
    const noise = new NoiseModel();
    noise.add(thermalRelaxationError({ t1: 2, t2: 1, time: 0 }), "FSIM");

    const c = new Circuit(2);
    c.add(gate("FSIM", [0, 1], [0.1, 0.2]));
    const noisy = noise.apply(c);

    expect(noisy.queue.map((g) => g.name)).toEqual([
      "FSIM",
      "ThermalRelaxationChannel",
      "ThermalRelaxationChannel",
    ]);
  });

  it("normalises filters to ascending, deduplicated sets", () => {
    const noise = new NoiseModel();
    noise.add(pauliError(), "H", [3, 1, 3], new Set([2, 0]));

    expect(noise.lookup("H")?.sourceQubits).toEqual([1, 3]);
    expect(noise.lookup("H")?.targetQubits).toEqual([0, 2]);
  });

  it("rejects filter values that are not qubits", () => {
    const noise = new NoiseModel();
    const filter: number[] = JSON.parse('[0, "1"]');

    let caught: unknown;
    try {
      noise.add(pauliError(), "H", filter);
    } catch (e) {
      caught = e;
    }
    expect(isNoiseError(caught, NE.TYPE_MISMATCH)).toBe(true);
    expect(noise.size).toBe(0);

    const last = logStore.getState().lines.at(-1);
    expect(last?.level).toBe("error");
    expect(last?.message).toBe(
      "failed to add pauli error on H: Error 1020: Expected a qubit index (non-negative integer), got string '1'.",
    );
    expect(last?.meta).toEqual({ model: "noise-model", code: NE.TYPE_MISMATCH });
  });

  it("injects once per distinct qubit of a gate that repeats a qubit", () => {
    const noise = new NoiseModel();
    noise.add(pauliError({ px: 0.1 }), "CNOT");

    const c = new Circuit(2);
    c.add(gate("CNOT", [0, 0]));

    expect(noise.apply(c).queue.slice(1).map((g) => g.qbits)).toEqual([[0]]);
  });

  it("copies parametrized, trainable and measurement metadata", () => {
    const noise = new NoiseModel();
    noise.add(pauliError({ px: 0.1 }), "H");

    const c = new Circuit(2);
    c.add([RX(0, 0.1), RY(1, 0.2, false), H(0), M([0, 1])]);
    const noisy = noise.apply(c);

    expect(noisy.parametrizedGates).toEqual(c.parametrizedGates);
    expect(noisy.parametrizedGates).not.toBe(c.parametrizedGates);
    expect(noisy.trainableGates.map((g) => g.name)).toEqual(["RX"]);
    expect(noisy.measurementTuples).toEqual({ register0: [0, 1] });
    expect(noisy.measurementTuples).not.toBe(c.measurementTuples);
    expect(noisy.measurementGate).toBe(c.measurementGate);
  });

  it("surfaces a target qubit outside the circuit and logs it", () => {
    const noise = new NoiseModel({ name: "wide" });
    noise.add(pauliError({ px: 0.1 }), "H", undefined, 5);

    const c = new Circuit(2);
    c.add(H(0));

    expect(() => noise.apply(c)).toThrow("Error 1021: Gate 'PauliNoiseChannel' acts on qubit 5 but the circuit has 2 qubits.");
    const last = logStore.getState().lines.at(-1);
    expect(last?.level).toBe("error");
    expect(last?.meta).toEqual({ model: "wide", code: NE.INVALID_QUBIT });
  });

  it("logs registrations at debug and applications at info", () => {
    configure({ logLevel: "debug" });
    const noise = new NoiseModel();
    noise.add(pauliError({ px: 0.5 }), "H", 1);
    noise.add(pauliError({ py: 0.5 }), "CNOT");

    const c = new Circuit(2);
    c.add([H(0), H(1), CNOT(0, 1)]);
    noise.apply(c);

    const lines = logStore.getState().lines;
    expect(lines.map((l) => l.message)).toEqual([
      "added pauli error on H",
      "added pauli error on CNOT",
      "applied noise-model: 3 gates, 3 channels injected",
    ]);
    expect(lines[0].meta).toEqual({ model: "noise-model", source: "1", target: null });
    expect(lines[2].level).toBe("info");
  });

  it("removes and clears registrations", () => {
    const noise = new NoiseModel();
    noise.add(pauliError(), "H");
    noise.add(pauliError(), "X");
    noise.add(pauliError(), "CNOT");

    expect(noise.gates()).toEqual(["H", "X", "CNOT"]);
    expect(noise.remove("X")).toBe(true);
    expect(noise.remove("X")).toBe(false);
    expect(noise.gates()).toEqual(["H", "CNOT"]);

    noise.clear();
    expect(noise.size).toBe(0);
  });

  it("does not change a table read before a later registration", () => {
    const noise = new NoiseModel();
    noise.add(pauliError(), "H");
    const before = noise.table;
    noise.add(pauliError(), "X");

    expect(before.size).toBe(1);
    expect(noise.table.size).toBe(2);
  });
});
