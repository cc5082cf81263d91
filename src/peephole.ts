import * as ir from './ir'
import { type Op, OpCode } from './ir'

export interface Match {
    op: Op
    len: number
}

export type Rule = (ops: Op[], i: number) => Match | null

// +, - or a clear
function isUpdate(op: Op | undefined): op is Op {
    return !!op && (ir.isArith(op) || op.opcode == OpCode.clear)
}

// >>>+<<<, <[-]>, >>--<<
export const offsetUpdate: Rule = (ops, i) => {
    const mv = ops[i], upd = ops[i + 1], back = ops[i + 2]
    if (i + 2 >= ops.length || !ir.isMove(mv) || !isUpdate(upd))
        return null
    if (back.opcode != ir.opposite(mv.opcode) || back.num != mv.num)
        return null
    const offset = ir.moveDelta(mv)
    return {
        op: upd.opcode == OpCode.clear ? ir.clearAt(offset) : ir.addAt(offset, ir.cellDelta(upd)),
        len: 3
    }
}

// ++>, -<
export const updateAdvance: Rule = (ops, i) => {
    const upd = ops[i], mv = ops[i + 1]
    if (i + 1 >= ops.length || !ir.isArith(upd) || !ir.isMove(mv) || mv.num != 1)
        return null
    return { op: ir.addMove(ir.cellDelta(upd), ir.moveDelta(mv)), len: 2 }
}

// <<+, >>>-, >>>[-]
export const advanceUpdate: Rule = (ops, i) => {
    const mv = ops[i], upd = ops[i + 1]
    if (i + 1 >= ops.length || !ir.isMove(mv) || !isUpdate(upd))
        return null
    const shift = ir.moveDelta(mv)
    return {
        op: upd.opcode == OpCode.clear ? ir.moveClear(shift) : ir.moveAdd(shift, ir.cellDelta(upd)),
        len: 2
    }
}

export const rules: Rule[] = [offsetUpdate, updateAdvance, advanceUpdate]

/**
 * Rewrite neighboring moves and updates into fused statements. Reduced loops
 * are opaque here; the bodies of loops that were kept are matched like
 * anything else. Whatever no rule matches is emitted as it is.
 */
export function fuse(ops: Op[]): Op[] {
    const res: Op[] = []
    for (let i = 0; i < ops.length;) {
        let m: Match | null = null
        for (const rule of rules) {
            m = rule(ops, i)
            if (m) break
        }
        if (m) {
            res.push(m.op)
            i += m.len
        } else {
            res.push(ops[i++])
        }
    }
    return res
}
