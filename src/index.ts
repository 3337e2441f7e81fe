export type {
  ChannelGate,
  CircuitInit,
  GateModel,
  MeasurementGate,
  PauliNoiseChannelGate,
  Qubit,
  ResetChannelGate,
  ThermalRelaxationChannelGate,
  UnitaryGate,
} from "../shared/protocol/CircuitTypes";

export { Circuit } from "./circuit/Circuit";
export { PauliNoiseChannel, ResetChannel, ThermalRelaxationChannel } from "./circuit/channels";
export * as gates from "./circuit/gates";
export { GATE_NAMES, type GateName, type GateType } from "./circuit/gates";
export { intersectQubits, qubitSet, type QubitsArg } from "./circuit/qubits";

export {
  isQuantumError,
  pauliError,
  QUANTUM_ERROR_KINDS,
  resetError,
  thermalRelaxationError,
  type PauliError,
  type PauliOptions,
  type QuantumError,
  type QuantumErrorKind,
  type ResetError,
  type ResetOptions,
  type ThermalRelaxationError,
  type ThermalRelaxationOptions,
  type ThermalRelaxationParams,
} from "./noise/errors";
export { applyNoise, applyNoiseDetailed, noiseQubits, type ApplyNoiseOptions, type ApplyNoiseResult } from "./noise/apply";
export { NoiseModel, type NoiseModelOptions } from "./noise/NoiseModel";

export type { NoiseRegistration, RegistrationTable } from "./state/noiseModelStore";
export { logStore, type LogLevel, type LogLine, type LogSource } from "./state/logStore";

export {
  configure,
  DEFAULT_CONFIG,
  getConfig,
  loadConfigFromEnv,
  resetConfig,
  type BothFiltersPolicy,
  type NoiseConfig,
} from "./config";

export { isNoiseError, NE, NoiseError, NoiseErrors } from "./utils/errorCatalog";
export { formatCircuit, formatGate, formatQubits } from "./utils/formatter";
export {
  errorFromSnapshot,
  errorToSnapshot,
  parseSnapshot,
  stringifySnapshot,
  type NoiseModelSnapshotV1,
  type RegistrationSnapshot,
} from "./utils/snapshots";
