import type { GateModel, Qubit } from '../../shared/protocol/CircuitTypes'
import type { Circuit } from '../circuit/Circuit'

export function formatQubits(qbits: readonly Qubit[]) {
  return qbits.join(',')
}

function fmtOptions(options: Record<string, number | undefined>) {
  return Object.entries(options)
    .filter((e): e is [string, number] => e[1] !== undefined)
    .map(([k, v]) => `${k}=${v}`)
    .join(', ')
}

// H(0), RX(1; 0.5), M(0,1 -> register0), PauliNoiseChannel(0; px=0.5, py=0, pz=0)
export function formatGate(g: GateModel): string {
  const qs = formatQubits(g.qbits)
  switch (g.kind) {
    case 'unitary':
      return g.params.length ? `${g.name}(${qs}; ${g.params.join(', ')})` : `${g.name}(${qs})`
    case 'measurement':
      return g.register ? `${g.name}(${qs} -> ${g.register})` : `${g.name}(${qs})`
    case 'channel':
      return `${g.name}(${qs}; ${fmtOptions(g.options)})`
  }
}

export function formatCircuit(c: Circuit): string {
  const lines = [`Circuit(nqubits=${c.nqubits}${c.densityMatrix ? ', densityMatrix' : ''})`]
  for (const g of c.queue) lines.push(`  ${formatGate(g)}`)
  for (const [register, qbits] of Object.entries(c.measurementTuples)) {
    lines.push(`  measure ${formatQubits(qbits)} -> ${register}`)
  }
  return lines.join('\n')
}
