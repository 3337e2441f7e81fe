import type {
  ChannelGate,
  PauliNoiseChannelGate,
  Qubit,
  ResetChannelGate,
  ThermalRelaxationChannelGate,
} from "../../shared/protocol/CircuitTypes";
import { PauliNoiseChannel, ResetChannel, ThermalRelaxationChannel } from "../circuit/channels";
import {
  checkNonNegative,
  checkPositive,
  checkProbability,
  checkProbabilitySum,
  checkSeed,
} from "../circuit/validators";
import { NoiseErrors } from "../utils/errorCatalog";

// Only the factories in this module can produce a value carrying the brand.
const BRAND: unique symbol = Symbol("QuantumError");

export type PauliOptions = { px: number; py: number; pz: number; seed?: number };
export type ThermalRelaxationOptions = {
  t1: number;
  t2: number;
  time: number;
  excitedPopulation: number;
  seed?: number;
};
export type ResetOptions = { p0: number; p1: number; seed?: number };

interface ErrorVariant<K extends string, O, C extends ChannelGate> {
  readonly [BRAND]: true;
  readonly kind: K;
  readonly options: Readonly<O>;
  /** Channel gate applying this error's options to qubit `q`. */
  realize(q: Qubit): C;
}

export type PauliError = ErrorVariant<"pauli", PauliOptions, PauliNoiseChannelGate>;
export type ThermalRelaxationError = ErrorVariant<
  "thermalRelaxation",
  ThermalRelaxationOptions,
  ThermalRelaxationChannelGate
>;
export type ResetError = ErrorVariant<"reset", ResetOptions, ResetChannelGate>;

export type QuantumError = PauliError | ThermalRelaxationError | ResetError;
export type QuantumErrorKind = QuantumError["kind"];

export const QUANTUM_ERROR_KINDS: readonly QuantumErrorKind[] = ["pauli", "thermalRelaxation", "reset"];

function seedField(seed: number | undefined): { seed?: number } {
  return seed === undefined ? {} : { seed };
}

/** Error realized by a Pauli noise channel (X, Y, Z flips with the given probabilities). */
export function pauliError(params: Partial<PauliOptions> = {}): PauliError {
  const px = checkProbability("px", params.px ?? 0);
  const py = checkProbability("py", params.py ?? 0);
  const pz = checkProbability("pz", params.pz ?? 0);
  checkProbabilitySum({ px, py, pz });
  const options: Readonly<PauliOptions> = Object.freeze({ px, py, pz, ...seedField(checkSeed(params.seed)) });
  return Object.freeze({
    [BRAND]: true as const,
    kind: "pauli" as const,
    options,
    realize: (q: Qubit) => PauliNoiseChannel(q, options.px, options.py, options.pz, options.seed),
  });
}

export type ThermalRelaxationParams = Omit<ThermalRelaxationOptions, "excitedPopulation"> & {
  excitedPopulation?: number;
};

/** Error realized by a thermal relaxation channel with relaxation times t1, t2 over a gate of length `time`. */
export function thermalRelaxationError(params: ThermalRelaxationParams): ThermalRelaxationError {
  const t1 = checkPositive("t1", params.t1);
  const t2 = checkPositive("t2", params.t2);
  const time = checkNonNegative("time", params.time);
  const excitedPopulation = checkProbability("excitedPopulation", params.excitedPopulation ?? 0);
  if (t2 > 2 * t1) throw NoiseErrors.relaxationTimes(t1, t2);
  const options: Readonly<ThermalRelaxationOptions> = Object.freeze({
    t1,
    t2,
    time,
    excitedPopulation,
    ...seedField(checkSeed(params.seed)),
  });
  return Object.freeze({
    [BRAND]: true as const,
    kind: "thermalRelaxation" as const,
    options,
    realize: (q: Qubit) =>
      ThermalRelaxationChannel(q, options.t1, options.t2, options.time, options.excitedPopulation, options.seed),
  });
}

/** Error realized by a reset channel toward |0> (p0) or |1> (p1). */
export function resetError(params: Partial<ResetOptions> = {}): ResetError {
  const p0 = checkProbability("p0", params.p0 ?? 0);
  const p1 = checkProbability("p1", params.p1 ?? 0);
  checkProbabilitySum({ p0, p1 });
  const options: Readonly<ResetOptions> = Object.freeze({ p0, p1, ...seedField(checkSeed(params.seed)) });
  return Object.freeze({
    [BRAND]: true as const,
    kind: "reset" as const,
    options,
    realize: (q: Qubit) => ResetChannel(q, options.p0, options.p1, options.seed),
  });
}

export function isQuantumError(value: unknown): value is QuantumError {
  return typeof value === "object" && value !== null && BRAND in value;
}
