import * as U from './util'

export enum OpCode {
    // source level
    inc,
    dec,
    clear,
    right,
    left,
    loopOpen,
    loopClose,
    scanRight,
    scanLeft,
    input,
    output,
    ext,
    // peephole fusion
    addAt,
    clearAt,
    addMove,
    moveAdd,
    moveClear,
    // loop reduction
    reduced,
    mulAdd,
    condAdd,
    condClear,
}

/**
 * A single token of the instruction stream.
 *
 * For source-level opcodes `num` is the repeat count. Fused and reduced
 * opcodes use `num` as a signed delta (for `mulAdd`, with the loop divisor in
 * `den`) and `offset` as a cell offset or a pointer move relative to the
 * current cell.
 */
export interface Op {
    opcode: OpCode
    num: number
    offset: number
    den?: number
    body?: Op[]
    fname?: string
}

export function op(opcode: OpCode, num = 1): Op {
    return { opcode, num, offset: 0 }
}

export function ext(symbol: string): Op {
    return { opcode: OpCode.ext, num: 1, offset: 0, fname: symbol }
}

export function addAt(offset: number, delta: number): Op {
    U.assert(delta != 0)
    return { opcode: OpCode.addAt, num: delta, offset }
}

export function clearAt(offset: number): Op {
    return { opcode: OpCode.clearAt, num: 1, offset }
}

export function addMove(delta: number, step: number): Op {
    U.assert(step == 1 || step == -1)
    return { opcode: OpCode.addMove, num: delta, offset: step }
}

export function moveAdd(shift: number, delta: number): Op {
    return { opcode: OpCode.moveAdd, num: delta, offset: shift }
}

export function moveClear(shift: number): Op {
    return { opcode: OpCode.moveClear, num: 1, offset: shift }
}

export function reduced(body: Op[]): Op {
    return { opcode: OpCode.reduced, num: 1, offset: 0, body }
}

// cell[offset] += delta on every iteration of a loop whose origin drops by `divisor` per iteration
export function mulAdd(offset: number, delta: number, divisor: number): Op {
    U.assert(offset != 0 && delta != 0 && divisor != 0)
    return { opcode: OpCode.mulAdd, num: delta, offset, den: divisor }
}

export function condAdd(offset: number, delta: number): Op {
    return { opcode: OpCode.condAdd, num: delta, offset }
}

export function condClear(offset: number): Op {
    return { opcode: OpCode.condClear, num: 1, offset }
}

export function isMove(op: Op) {
    return op.opcode == OpCode.right || op.opcode == OpCode.left
}

export function isArith(op: Op) {
    return op.opcode == OpCode.inc || op.opcode == OpCode.dec
}

export function isLoopMarker(op: Op) {
    return op.opcode == OpCode.loopOpen || op.opcode == OpCode.loopClose
}

// signed pointer displacement of a move token
export function moveDelta(op: Op) {
    return op.opcode == OpCode.right ? op.num : op.opcode == OpCode.left ? -op.num : 0
}

// signed cell change of an inc/dec token
export function cellDelta(op: Op) {
    return op.opcode == OpCode.inc ? op.num : op.opcode == OpCode.dec ? -op.num : 0
}

export function opposite(opcode: OpCode) {
    switch (opcode) {
        case OpCode.inc: return OpCode.dec
        case OpCode.dec: return OpCode.inc
        case OpCode.right: return OpCode.left
        case OpCode.left: return OpCode.right
        default: return U.oops("no opposite for " + OpCode[opcode])
    }
}

const symbols: U.SMap<string> = {
    [OpCode.inc]: "+",
    [OpCode.dec]: "-",
    [OpCode.right]: ">",
    [OpCode.left]: "<",
    [OpCode.loopOpen]: "[",
    [OpCode.loopClose]: "]",
    [OpCode.output]: ".",
    [OpCode.input]: ",",
    [OpCode.clear]: "[-]",
    [OpCode.scanRight]: "[>]",
    [OpCode.scanLeft]: "[<]",
}

/**
 * Human readable form of a stream, used in verbose output and in tests.
 * Counts are written before the symbol, e.g. `3+` or `12>`.
 */
export function stringify(ops: Op[]): string {
    return ops.map(stringify1).join(" ")
}

function signed(n: number) {
    return n < 0 ? "" + n : "+" + n
}

function stringify1(op: Op): string {
    const sym = symbols[op.opcode]
    if (sym !== undefined)
        return op.num == 1 ? sym : op.num + sym
    switch (op.opcode) {
        case OpCode.ext:
            return op.fname || "?"
        case OpCode.addAt:
            return `@${op.offset}${signed(op.num)}`
        case OpCode.clearAt:
            return `@${op.offset}=0`
        case OpCode.addMove:
            return `${signed(op.num)}${op.offset > 0 ? ">" : "<"}`
        case OpCode.moveAdd:
            return `${op.offset}${signed(op.num)}`
        case OpCode.moveClear:
            return `${op.offset}=0`
        case OpCode.reduced:
            return `{${stringify(op.body || [])}}`
        case OpCode.mulAdd:
            return `@${op.offset}+=${op.num}/${op.den}`
        case OpCode.condAdd:
            return `@${op.offset}?${signed(op.num)}`
        case OpCode.condClear:
            return `@${op.offset}?=0`
        default:
            return U.oops("bad op " + op.opcode)
    }
}

export function numLoops(ops: Op[]) {
    return ops.filter(op => op.opcode == OpCode.loopOpen).length
}
