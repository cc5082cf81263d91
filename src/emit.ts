import { type Op, OpCode } from './ir'
import * as L from './library'
import type { EofMode, Extension } from './library'
import * as U from './util'

export interface EmitOptions {
    eof: EofMode
    extensions: Extension[]
}

export function indent(s: string) {
    return "    " + s.replace(/\n$/, "").replace(/\n/g, "\n    ") + "\n"
}

/**
 * Number of times a reduced loop runs, as an expression over the origin
 * cell. With 32-bit cells a loop whose origin drops by `divisor` per
 * iteration exits after the smallest `n` with `n * divisor == d[p]` modulo
 * 2^32. Writing `divisor` as `2^k * m` with `m` odd, that is `d[p] / 2^k`
 * times the inverse of `m`, modulo 2^(32 - k). When `d[p]` isn't a multiple
 * of 2^k the source loop never exits.
 */
export function iterationCount(divisor: number) {
    const k = U.trailingZeros(divisor)
    const inv = U.inverseOdd(divisor / 2 ** k)
    if (k == 0)
        return `Math.imul(d[p], ${inv}) >>> 0`
    if (inv == 1)
        return `d[p] >>> ${k}`
    return `Math.imul(d[p] >>> ${k}, ${inv}) & 0x${(2 ** (32 - k) - 1).toString(16)}`
}

// divisor of a reduced loop that needs its iteration count in `n`, or 0
export function countedDivisor(op: Op) {
    for (const o of op.body || []) {
        const divisor = o.den || 1
        if (o.opcode == OpCode.mulAdd && divisor != 1 && divisor != -1)
            return divisor
    }
    return 0
}

function mulAddStmt(op: Op) {
    const trg = L.cell(op.offset)
    const divisor = op.den || 1
    if (divisor == 1 || divisor == -1) {
        // runs d[p] (or -d[p]) times, modulo 2^32
        const delta = op.num * divisor
        const abs = Math.abs(delta)
        return `${trg} ${delta < 0 ? "-=" : "+="} ${abs == 1 ? "d[p]" : `d[p] * ${abs}`};`
    }
    if (op.num == 1 || op.num == -1)
        return `${trg} ${op.num < 0 ? "-=" : "+="} n;`
    return `${trg} += Math.imul(n, ${op.num});`
}

function template(op: Op, opts: EmitOptions): string {
    switch (op.opcode) {
        case OpCode.inc:
            return L.addTo("d[p]", op.num)
        case OpCode.dec:
            return L.addTo("d[p]", -op.num)
        case OpCode.clear:
            return "d[p] = 0;"
        case OpCode.right:
            return L.movePtr(op.num)
        case OpCode.left:
            return L.movePtr(-op.num)
        case OpCode.loopOpen:
            return L.templates.loopOpen
        case OpCode.loopClose:
            return L.templates.loopClose
        case OpCode.scanRight:
            return L.templates.scanRight
        case OpCode.scanLeft:
            return L.templates.scanLeft
        case OpCode.output:
            return L.templates.output
        case OpCode.input:
            return L.inputStmt(opts.eof)
        case OpCode.ext: {
            const e = opts.extensions.find(e => e.symbol == op.fname)
            return e ? e.template : U.oops("no template for extension " + op.fname)
        }
        case OpCode.addAt:
            return L.addTo(L.cell(op.offset), op.num)
        case OpCode.clearAt:
            return `${L.cell(op.offset)} = 0;`
        case OpCode.addMove:
            // update first, then advance
            return L.addTo("d[p]", op.num) + "\n" + L.movePtr(op.offset)
        case OpCode.moveAdd:
            return L.addTo(L.movedCell(op.offset), op.num)
        case OpCode.moveClear:
            return `${L.movedCell(op.offset)} = 0;`
        case OpCode.reduced: {
            const lines = (op.body || []).map(o => template(o, opts))
            const divisor = countedDivisor(op)
            if (divisor)
                lines.unshift(`n = ${iterationCount(divisor)};`)
            return lines.join("\n")
        }
        case OpCode.mulAdd:
            return mulAddStmt(op)
        case OpCode.condAdd:
            return `if (d[p]) ${L.addTo(L.cell(op.offset), op.num)}`
        case OpCode.condClear:
            return `if (d[p]) ${L.cell(op.offset)} = 0;`
        default:
            return U.oops("bad op " + op.opcode)
    }
}

export function toJS(op: Op, opts: EmitOptions) {
    return template(op, opts) + "\n"
}

/**
 * Concatenate the templates of all tokens in program order. Loop bodies get
 * indented; that is the only structure in the output.
 */
export function toJSs(ops: Op[], opts: EmitOptions) {
    let r = ""
    let depth = 0
    for (const op of ops) {
        if (op.opcode == OpCode.loopClose)
            depth--
        let s = toJS(op, opts)
        for (let i = 0; i < depth; ++i)
            s = indent(s)
        r += s
        if (op.opcode == OpCode.loopOpen)
            depth++
    }
    return r
}

export function toProgram(ops: Op[], input: ArrayLike<number>, opts: EmitOptions) {
    return `((rt) => {\n${indent(L.preamble(input) + toJSs(ops, opts) + L.epilogue)}})`
}
