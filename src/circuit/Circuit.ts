// src/circuit/Circuit.ts
import type {
  CircuitInit,
  GateModel,
  MeasurementGate,
  Qubit,
  UnitaryGate,
} from "../../shared/protocol/CircuitTypes";
import { logCircuit } from "../state/logStore";
import { NoiseErrors } from "../utils/errorCatalog";
import { isParametrized } from "./gates";
import { checkPositive } from "./validators";

function normalizeInit(init: number | CircuitInit): CircuitInit {
  const value: CircuitInit = typeof init === "number" ? { nqubits: init } : { ...init };
  checkPositive("nqubits", value.nqubits);
  if (!Number.isInteger(value.nqubits)) {
    throw NoiseErrors.numericOutOfRange("nqubits", value.nqubits, "positive integers");
  }
  return value;
}

/**
 * Ordered gate queue over a fixed number of qubits.
 *
 * Measurements are kept apart from the queue: a measurement gate records its
 * qubits under a register name in `measurementTuples` and becomes the
 * circuit's `measurementGate`. Once measured, no further gate can be queued.
 */
export class Circuit {
  readonly init: Readonly<CircuitInit>;
  readonly queue: GateModel[] = [];

  parametrizedGates: UnitaryGate[] = [];
  trainableGates: UnitaryGate[] = [];
  measurementTuples: Record<string, Qubit[]> = {};
  measurementGate: MeasurementGate | null = null;

  constructor(init: number | CircuitInit) {
    this.init = Object.freeze(normalizeInit(init));
  }

  /** Empty circuit built from the same construction parameters. */
  static fromInit(init: CircuitInit): Circuit {
    return new Circuit(init);
  }

  get nqubits(): number {
    return this.init.nqubits;
  }

  get densityMatrix(): boolean {
    return this.init.densityMatrix ?? false;
  }

  get ngates(): number {
    return this.queue.length;
  }

  add(gates: GateModel | GateModel[]): void {
    const list = Array.isArray(gates) ? gates : [gates];
    for (const g of list) this.addOne(g);
  }

  private addOne(g: GateModel): void {
    for (const q of g.qbits) {
      if (q >= this.nqubits) throw NoiseErrors.invalidQubit(g.name, q, this.nqubits);
    }

    if (g.kind === "measurement") {
      this.addMeasurement(g);
      return;
    }
    if (this.measurementGate) throw NoiseErrors.gateAfterMeasurement(g.name);

    this.queue.push(g);
    if (g.kind === "unitary" && isParametrized(g)) {
      this.parametrizedGates.push(g);
      if (g.trainable) this.trainableGates.push(g);
    }
  }

  private addMeasurement(g: MeasurementGate): void {
    const register = g.register || `register${Object.keys(this.measurementTuples).length}`;
    if (register in this.measurementTuples) throw NoiseErrors.duplicateRegister(register);
    this.measurementTuples[register] = [...g.qbits];
    this.measurementGate = g;
    logCircuit(`measure ${g.qbits.join(",")} -> ${register}`, "debug");
  }
}
