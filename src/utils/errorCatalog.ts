export type NoiseErrorInfo = {
  code: number
  message: string
}

export function noiseErrorMessage(code: number, message: string): string {
  return `Error ${code}: ${message}`
}

export class NoiseError extends Error {
  readonly code: number

  constructor(code: number, message: string) {
    super(noiseErrorMessage(code, message))
    this.name = 'NoiseError'
    this.code = code
  }

  toJSON(): NoiseErrorInfo {
    return { code: this.code, message: this.message }
  }
}

export function isNoiseError(e: unknown, code?: number): e is NoiseError {
  return e instanceof NoiseError && (code === undefined || e.code === code)
}

// Parameter errors 1010-1019, qubit/circuit errors 1020-1029, snapshot errors 1030-1039.
export const NE = {
  NUMERIC_OUT_OF_RANGE: 1010,
  PROBABILITY_SUM: 1011,
  RELAXATION_TIMES: 1012,

  TYPE_MISMATCH: 1020,
  INVALID_QUBIT: 1021,
  GATE_AFTER_MEASUREMENT: 1022,
  DUPLICATE_REGISTER: 1023,

  INVALID_JSON: 1030,
  INVALID_SNAPSHOT: 1031,
} as const

export const NoiseErrors = {
  numericOutOfRange(fieldLabel: string, value: number, range: string) {
    return new NoiseError(NE.NUMERIC_OUT_OF_RANGE, `Parameter '${fieldLabel}' = ${value} out of range ${range}.`)
  },

  probabilitySum(fieldLabels: string[], total: number) {
    return new NoiseError(NE.PROBABILITY_SUM, `Probabilities ${fieldLabels.join(' + ')} sum to ${total} (must be <= 1).`)
  },

  relaxationTimes(t1: number, t2: number) {
    return new NoiseError(NE.RELAXATION_TIMES, `Invalid T2 = ${t2}: greater than 2 * T1 = ${2 * t1}.`)
  },

  typeMismatch(value: unknown) {
    return new NoiseError(NE.TYPE_MISMATCH, `Expected a qubit index (non-negative integer), got ${describe(value)}.`)
  },

  invalidQubit(gateName: string, qubit: number, nqubits: number) {
    return new NoiseError(NE.INVALID_QUBIT, `Gate '${gateName}' acts on qubit ${qubit} but the circuit has ${nqubits} qubits.`)
  },

  gateAfterMeasurement(gateName: string) {
    return new NoiseError(NE.GATE_AFTER_MEASUREMENT, `Cannot add gate '${gateName}' after the circuit is measured.`)
  },

  duplicateRegister(register: string) {
    return new NoiseError(NE.DUPLICATE_REGISTER, `Measurement register '${register}' already exists.`)
  },

  invalidJson() {
    return new NoiseError(NE.INVALID_JSON, 'Invalid JSON.')
  },

  invalidSnapshot(detail: string) {
    return new NoiseError(NE.INVALID_SNAPSHOT, `Invalid noise model snapshot: ${detail}`)
  },
} as const

function describe(value: unknown): string {
  if (typeof value === 'string') return `string '${value}'`
  if (typeof value === 'number') return `number ${value}`
  if (value === null) return 'null'
  return typeof value
}
