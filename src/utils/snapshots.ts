import type { Qubit } from '../../shared/protocol/CircuitTypes'
import type { GateType } from '../circuit/gates'
import { isQubit } from '../circuit/qubits'
import {
  pauliError,
  QUANTUM_ERROR_KINDS,
  resetError,
  thermalRelaxationError,
  type QuantumError,
  type QuantumErrorKind,
} from '../noise/errors'
import type { NoiseRegistration, RegistrationTable } from '../state/noiseModelStore'
import { NoiseErrors } from './errorCatalog'

export type ErrorSnapshot = {
  kind: QuantumErrorKind
  options: Record<string, number>
}

export type RegistrationSnapshot = {
  gate: string
  error: ErrorSnapshot
  sourceQubits?: Qubit[]
  targetQubits?: Qubit[]
}

export type NoiseModelSnapshotV1 = {
  format: 'noise.model'
  version: 1
  name: string
  created_ts_ms: number
  errors: RegistrationSnapshot[]
}

export type RestoredRegistration = NoiseRegistration & { gate: GateType }

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function isKind(v: unknown): v is QuantumErrorKind {
  return QUANTUM_ERROR_KINDS.some(k => k === v)
}

export function errorToSnapshot(error: QuantumError): ErrorSnapshot {
  const options: Record<string, number> = {}
  for (const [k, v] of Object.entries(error.options)) {
    if (typeof v === 'number') options[k] = v
  }
  return { kind: error.kind, options }
}

/** Rebuilds a descriptor through its factory, so parameters are validated again. */
export function errorFromSnapshot(snap: ErrorSnapshot): QuantumError {
  const o: Partial<Record<string, number>> = snap.options
  switch (snap.kind) {
    case 'pauli':
      return pauliError({ px: o.px, py: o.py, pz: o.pz, seed: o.seed })
    case 'thermalRelaxation':
      if (o.t1 === undefined || o.t2 === undefined || o.time === undefined) {
        throw NoiseErrors.invalidSnapshot('thermalRelaxation error requires t1, t2 and time')
      }
      return thermalRelaxationError({
        t1: o.t1,
        t2: o.t2,
        time: o.time,
        excitedPopulation: o.excitedPopulation,
        seed: o.seed,
      })
    case 'reset':
      return resetError({ p0: o.p0, p1: o.p1, seed: o.seed })
  }
}

export function noiseModelToSnapshot(name: string, table: RegistrationTable): NoiseModelSnapshotV1 {
  const errors: RegistrationSnapshot[] = []
  for (const [gate, entry] of table) {
    const snap: RegistrationSnapshot = { gate, error: errorToSnapshot(entry.error) }
    if (entry.sourceQubits) snap.sourceQubits = [...entry.sourceQubits]
    if (entry.targetQubits) snap.targetQubits = [...entry.targetQubits]
    errors.push(snap)
  }
  return { format: 'noise.model', version: 1, name, created_ts_ms: Date.now(), errors }
}

export function noiseModelFromSnapshot(snap: NoiseModelSnapshotV1): RestoredRegistration[] {
  return snap.errors.map(e => {
    const out: RestoredRegistration = { gate: e.gate, error: errorFromSnapshot(e.error) }
    if (e.sourceQubits) out.sourceQubits = e.sourceQubits
    if (e.targetQubits) out.targetQubits = e.targetQubits
    return out
  })
}

function parseQubits(v: unknown, where: string): Qubit[] | undefined {
  if (v === undefined) return undefined
  if (!Array.isArray(v) || !v.every(isQubit)) {
    throw NoiseErrors.invalidSnapshot(`${where} must be an array of qubit indices`)
  }
  return v
}

function parseOptions(v: unknown, where: string): Record<string, number> {
  if (!isRecord(v)) throw NoiseErrors.invalidSnapshot(`${where}.options must be an object`)
  const out: Record<string, number> = {}
  for (const [k, x] of Object.entries(v)) {
    if (typeof x !== 'number') throw NoiseErrors.invalidSnapshot(`${where}.options.${k} must be a number`)
    out[k] = x
  }
  return out
}

function parseRegistration(v: unknown, i: number): RegistrationSnapshot {
  const where = `errors[${i}]`
  if (!isRecord(v)) throw NoiseErrors.invalidSnapshot(`${where} must be an object`)
  const gate = v.gate
  if (typeof gate !== 'string' || !gate) throw NoiseErrors.invalidSnapshot(`${where}.gate must be a non-empty string`)
  const error = v.error
  if (!isRecord(error)) throw NoiseErrors.invalidSnapshot(`${where}.error must be an object`)
  const kind = error.kind
  if (!isKind(kind)) {
    throw NoiseErrors.invalidSnapshot(`${where}.error.kind must be one of ${QUANTUM_ERROR_KINDS.join(', ')}`)
  }
  const out: RegistrationSnapshot = {
    gate,
    error: { kind, options: parseOptions(error.options, `${where}.error`) },
  }
  const source = parseQubits(v.sourceQubits, `${where}.sourceQubits`)
  const target = parseQubits(v.targetQubits, `${where}.targetQubits`)
  if (source) out.sourceQubits = source
  if (target) out.targetQubits = target
  return out
}

export function parseSnapshot(text: string): NoiseModelSnapshotV1 {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch {
    throw NoiseErrors.invalidJson()
  }
  if (!isRecord(raw)) throw NoiseErrors.invalidSnapshot('top level must be an object')
  if (raw.format !== 'noise.model') throw NoiseErrors.invalidSnapshot(`unknown format '${String(raw.format)}'`)
  if (raw.version !== 1) throw NoiseErrors.invalidSnapshot(`unsupported version ${String(raw.version)}`)
  const { name, created_ts_ms, errors } = raw
  if (!Array.isArray(errors)) throw NoiseErrors.invalidSnapshot('errors must be an array')

  return {
    format: 'noise.model',
    version: 1,
    name: typeof name === 'string' && name ? name : 'noise-model',
    created_ts_ms: typeof created_ts_ms === 'number' ? created_ts_ms : Date.now(),
    errors: errors.map(parseRegistration),
  }
}

export function stringifySnapshot(snap: NoiseModelSnapshotV1): string {
  return JSON.stringify(snap, null, 2)
}
