export type Qubit = number // index into the circuit's qubit register


export interface BaseGate {
    id: string
    name: string
    qbits: Qubit[]
}


export interface UnitaryGate extends BaseGate {
    kind: 'unitary'
    params: number[]
    trainable: boolean
}


export interface MeasurementGate extends BaseGate {
    kind: 'measurement'
    register: string
}


export interface PauliNoiseChannelGate extends BaseGate {
    kind: 'channel'
    name: 'PauliNoiseChannel'
    options: { px: number, py: number, pz: number, seed?: number }
}


export interface ThermalRelaxationChannelGate extends BaseGate {
    kind: 'channel'
    name: 'ThermalRelaxationChannel'
    options: { t1: number, t2: number, time: number, excitedPopulation: number, seed?: number }
    // derived from the relaxation times; exactly one of expT2 / pz is set
    probabilities: { p0: number, p1: number, expT2?: number, pz?: number }
}


export interface ResetChannelGate extends BaseGate {
    kind: 'channel'
    name: 'ResetChannel'
    options: { p0: number, p1: number, seed?: number }
}


export type ChannelGate = PauliNoiseChannelGate | ThermalRelaxationChannelGate | ResetChannelGate

export type GateModel = UnitaryGate | MeasurementGate | ChannelGate


export interface CircuitInit {
    nqubits: number
    densityMatrix?: boolean
}
