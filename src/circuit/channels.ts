import * as math from "mathjs";
import type {
  PauliNoiseChannelGate,
  Qubit,
  ResetChannelGate,
  ThermalRelaxationChannelGate,
} from "../../shared/protocol/CircuitTypes";
import { NoiseErrors } from "../utils/errorCatalog";
import { GATE_NAMES, newGateId } from "./gates";
import { toQubit } from "./qubits";
import {
  checkNonNegative,
  checkPositive,
  checkProbability,
  checkProbabilitySum,
  checkSeed,
} from "./validators";

/** Applies X, Y and Z with probabilities px, py and pz on one qubit. */
export function PauliNoiseChannel(q: Qubit, px = 0, py = 0, pz = 0, seed?: number): PauliNoiseChannelGate {
  checkProbability("px", px);
  checkProbability("py", py);
  checkProbability("pz", pz);
  checkProbabilitySum({ px, py, pz });
  return {
    id: newGateId(),
    kind: "channel",
    name: GATE_NAMES.PauliNoiseChannel,
    qbits: [toQubit(q)],
    options: { px, py, pz, ...seedField(checkSeed(seed)) },
  };
}

/**
 * Thermal relaxation of one qubit during a gate of duration `time`.
 *
 * The channel is described by reset probabilities toward |0> and |1>
 * (`p0`, `p1`), plus either the coherence factor `expT2` when `t1 < t2` or a
 * dephasing probability `pz` otherwise.
 */
export function ThermalRelaxationChannel(
  q: Qubit,
  t1: number,
  t2: number,
  time: number,
  excitedPopulation = 0,
  seed?: number,
): ThermalRelaxationChannelGate {
  checkPositive("t1", t1);
  checkPositive("t2", t2);
  checkNonNegative("time", time);
  checkProbability("excitedPopulation", excitedPopulation);
  if (t2 > 2 * t1) throw NoiseErrors.relaxationTimes(t1, t2);

  const decayT1 = math.exp(-time / t1);
  const decayT2 = math.exp(-time / t2);
  const pReset = 1 - decayT1;
  const probabilities: ThermalRelaxationChannelGate["probabilities"] = {
    p0: pReset * (1 - excitedPopulation),
    p1: pReset * excitedPopulation,
  };
  if (t1 < t2) probabilities.expT2 = decayT2;
  else probabilities.pz = (decayT1 - decayT2) / 2;

  return {
    id: newGateId(),
    kind: "channel",
    name: GATE_NAMES.ThermalRelaxationChannel,
    qbits: [toQubit(q)],
    options: { t1, t2, time, excitedPopulation, ...seedField(checkSeed(seed)) },
    probabilities,
  };
}

/** Resets one qubit to |0> with probability p0 and to |1> with probability p1. */
export function ResetChannel(q: Qubit, p0 = 0, p1 = 0, seed?: number): ResetChannelGate {
  checkProbability("p0", p0);
  checkProbability("p1", p1);
  checkProbabilitySum({ p0, p1 });
  return {
    id: newGateId(),
    kind: "channel",
    name: GATE_NAMES.ResetChannel,
    qbits: [toQubit(q)],
    options: { p0, p1, ...seedField(checkSeed(seed)) },
  };
}

function seedField(seed: number | undefined): { seed?: number } {
  return seed === undefined ? {} : { seed };
}
