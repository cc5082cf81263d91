import * as ir from './ir'
import { type Op, OpCode } from './ir'
import * as U from './util'

type Fragment =
    | { kind: "scaled", offset: number, delta: number } // delta per iteration
    | { kind: "add", offset: number, delta: number } // constant, after the cell was cleared in the body
    | { kind: "clear", offset: number }

export interface ReduceResult {
    ops: Op[]
    reduced: number
    kept: number
}

/**
 * Try to replace one innermost loop body with straight-line code.
 *
 * One iteration is emulated with a virtual pointer starting at the origin
 * cell. Changes of the origin cell make up the divisor (how much the origin
 * drops per iteration); every other change becomes a fragment applied once
 * per iteration, with the iteration count computed from the entry value of
 * the origin and the divisor. A clear of the origin means the body runs at
 * most once. Returns null when the body
 * can't be expressed this way; the result never moves the pointer.
 */
export function reduceLoop(body: Op[]): Op | null {
    let drift = 0
    for (const op of body) {
        if (ir.isMove(op))
            drift += ir.moveDelta(op)
        else if (!ir.isArith(op) && op.opcode != OpCode.clear)
            return null
    }
    if (drift != 0)
        return null

    let pos = 0
    let started = false
    let divisor = 0
    let clearedAtEnd = true
    const frags: Fragment[] = []
    const cleared = new Set<number>()

    for (const op of body) {
        if (ir.isMove(op)) {
            pos += ir.moveDelta(op)
        } else if (op.opcode == OpCode.clear) {
            if (pos) {
                frags.push({ kind: "clear", offset: pos })
                cleared.add(pos)
            } else {
                started = true
                clearedAtEnd = false
            }
        } else {
            const delta = ir.cellDelta(op)
            if (pos) {
                frags.push({ kind: cleared.has(pos) ? "add" : "scaled", offset: pos, delta })
            } else {
                // origin set to non-zero after its clear; the loop never exits
                if (!clearedAtEnd)
                    return null
                started = true
                divisor -= delta
            }
        }
    }

    if (!started)
        return null

    const once = !clearedAtEnd
    if (!once && divisor == 0)
        return null

    const res: Op[] = []
    for (const f of frags) {
        switch (f.kind) {
            case "clear":
                res.push(ir.condClear(f.offset))
                break
            case "add":
                res.push(ir.condAdd(f.offset, f.delta))
                break
            case "scaled":
                if (once)
                    res.push(ir.condAdd(f.offset, f.delta))
                else
                    res.push(ir.mulAdd(f.offset, f.delta, divisor))
                break
        }
    }
    // the origin is cleared last, so that the guards above see its entry value
    res.push(ir.clearAt(0))

    return ir.reduced(res)
}

/**
 * Reduce every innermost loop of the stream. Loops that contain other loops
 * are left alone, even if all their inner loops got reduced.
 */
export function reduceLoops(ops: Op[]): ReduceResult {
    const res: Op[] = []
    const stack: { start: number, innermost: boolean }[] = []
    let reduced = 0
    let kept = 0

    for (const op of ops) {
        if (op.opcode == OpCode.loopOpen) {
            if (stack.length)
                stack[stack.length - 1].innermost = false
            stack.push({ start: res.length, innermost: true })
            res.push(op)
        } else if (op.opcode == OpCode.loopClose) {
            const frame = stack.pop()
            if (!frame)
                throw new Error("unbalanced loop")
            const r = frame.innermost ? reduceLoop(res.slice(frame.start + 1)) : null
            if (r) {
                res.length = frame.start
                res.push(r)
                reduced++
            } else {
                res.push(op)
                kept++
            }
        } else {
            res.push(op)
        }
    }

    U.assert(stack.length == 0, "unbalanced loop")

    return { ops: res, reduced, kept }
}
