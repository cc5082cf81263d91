import * as ir from './ir'
import type { Op } from './ir'

export const REPEAT_CAP = 99

function foldable(op: Op) {
    return ir.isArith(op) || ir.isMove(op)
}

/**
 * Replace every run of +/- (or of >/<) with its net effect, as count-1
 * tokens. Cancelling runs that end up next to each other fold too, which
 * makes the pass idempotent.
 */
export function foldRuns(ops: Op[]): Op[] {
    const res: Op[] = []
    for (const op of ops) {
        if (!foldable(op)) {
            res.push(op)
            continue
        }
        const rev = ir.opposite(op.opcode)
        for (let i = 0; i < op.num; ++i) {
            const last = res[res.length - 1]
            if (last && last.opcode == rev)
                res.pop()
            else
                res.push(ir.op(op.opcode))
        }
    }
    return res
}

export function encodeRepeats(ops: Op[]): Op[] {
    const res: Op[] = []
    for (let i = 0; i < ops.length;) {
        const op = ops[i]
        if (!foldable(op) || op.num != 1) {
            res.push(op)
            i++
            continue
        }
        let len = 1
        while (i + len < ops.length && ops[i + len].opcode == op.opcode && ops[i + len].num == 1)
            len++
        i += len
        while (len > 0) {
            const n = Math.min(len, REPEAT_CAP)
            res.push(ir.op(op.opcode, n))
            len -= n
        }
    }
    return res
}

export function expandRepeats(ops: Op[]): Op[] {
    const res: Op[] = []
    for (const op of ops) {
        if (foldable(op)) {
            for (let i = 0; i < op.num; ++i)
                res.push(ir.op(op.opcode))
        } else {
            res.push(op)
        }
    }
    return res
}
