// src/circuit/gates.ts
import { randomUUID } from "node:crypto";
import type { MeasurementGate, Qubit, UnitaryGate } from "../../shared/protocol/CircuitTypes";
import { toQubit, type QubitsArg } from "./qubits";

export const GATE_NAMES = {
  I: "I",
  H: "H",
  X: "X",
  Y: "Y",
  Z: "Z",
  S: "S",
  T: "T",
  RX: "RX",
  RY: "RY",
  RZ: "RZ",
  U1: "U1",
  CNOT: "CNOT",
  CZ: "CZ",
  SWAP: "SWAP",
  TOFFOLI: "TOFFOLI",
  M: "M",
  PauliNoiseChannel: "PauliNoiseChannel",
  ThermalRelaxationChannel: "ThermalRelaxationChannel",
  ResetChannel: "ResetChannel",
} as const;

export type GateName = (typeof GATE_NAMES)[keyof typeof GATE_NAMES];

/** Gate-type identity used as the noise registration key. Unknown names are allowed. */
export type GateType = GateName | (string & {});

export function newGateId(): string {
  return randomUUID();
}

/** Builds a unitary gate of any name; the named helpers below cover the built-in set. */
export function gate(name: GateType, qbits: Qubit[], params: number[] = [], trainable = true): UnitaryGate {
  return {
    id: newGateId(),
    kind: "unitary",
    name,
    qbits: qbits.map(toQubit),
    params: [...params],
    trainable: params.length > 0 && trainable,
  };
}

/* ---------------- one qubit ---------------- */
export const I = (q: Qubit) => gate(GATE_NAMES.I, [q]);
export const H = (q: Qubit) => gate(GATE_NAMES.H, [q]);
export const X = (q: Qubit) => gate(GATE_NAMES.X, [q]);
export const Y = (q: Qubit) => gate(GATE_NAMES.Y, [q]);
export const Z = (q: Qubit) => gate(GATE_NAMES.Z, [q]);
export const S = (q: Qubit) => gate(GATE_NAMES.S, [q]);
export const T = (q: Qubit) => gate(GATE_NAMES.T, [q]);

/* ---------------- parametrized ---------------- */
export const RX = (q: Qubit, theta: number, trainable = true) => gate(GATE_NAMES.RX, [q], [theta], trainable);
export const RY = (q: Qubit, theta: number, trainable = true) => gate(GATE_NAMES.RY, [q], [theta], trainable);
export const RZ = (q: Qubit, theta: number, trainable = true) => gate(GATE_NAMES.RZ, [q], [theta], trainable);
export const U1 = (q: Qubit, theta: number, trainable = true) => gate(GATE_NAMES.U1, [q], [theta], trainable);

/* ---------------- multi qubit ---------------- */
export const CNOT = (control: Qubit, target: Qubit) => gate(GATE_NAMES.CNOT, [control, target]);
export const CZ = (control: Qubit, target: Qubit) => gate(GATE_NAMES.CZ, [control, target]);
export const SWAP = (a: Qubit, b: Qubit) => gate(GATE_NAMES.SWAP, [a, b]);
export const TOFFOLI = (c0: Qubit, c1: Qubit, target: Qubit) => gate(GATE_NAMES.TOFFOLI, [c0, c1, target]);

/* ---------------- measurement ---------------- */
/** Measures `qubits` into `register`; the circuit names the register when omitted. */
export function M(qubits: QubitsArg, register?: string): MeasurementGate {
  return {
    id: newGateId(),
    kind: "measurement",
    name: GATE_NAMES.M,
    qbits: typeof qubits === "number" ? [toQubit(qubits)] : Array.from(qubits, toQubit),
    register: register ?? "",
  };
}

export function isParametrized(g: UnitaryGate): boolean {
  return g.params.length > 0;
}
