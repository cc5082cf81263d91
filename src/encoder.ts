import * as ir from './ir'
import { type Op, OpCode } from './ir'
import type { Extension } from './library'
import * as U from './util'

export const CORE_ALPHABET = "+-<>[].,"

const idioms: U.SMap<OpCode> = {
    "[-]": OpCode.clear,
    "[+]": OpCode.clear,
    "[<]": OpCode.scanLeft,
    "[>]": OpCode.scanRight,
}

const opcodes: U.SMap<OpCode> = {
    "+": OpCode.inc,
    "-": OpCode.dec,
    ">": OpCode.right,
    "<": OpCode.left,
    "[": OpCode.loopOpen,
    "]": OpCode.loopClose,
    ".": OpCode.output,
    ",": OpCode.input,
}

export function checkExtensions(extensions: Extension[]) {
    const seen: U.SMap<boolean> = {}
    for (const e of extensions) {
        U.assert(e.symbol.length == 1, `extension symbol must be a single character: '${e.symbol}'`)
        U.assert(CORE_ALPHABET.indexOf(e.symbol) < 0, `extension cannot redefine '${e.symbol}'`)
        U.assert(!seen[e.symbol], `duplicate extension '${e.symbol}'`)
        seen[e.symbol] = true
    }
}

export function sanitize(src: string, extensions: Extension[] = []) {
    const alphabet = CORE_ALPHABET + extensions.map(e => e.symbol).join("")
    let r = ""
    for (const ch of src) {
        if (alphabet.indexOf(ch) >= 0)
            r += ch
    }
    return r
}

/**
 * Turn source text into a stream of count-1 tokens. Idioms are recognized on
 * the sanitized text before anything else, unmatched brackets are dropped and
 * loops at the very start of the program are removed, since the tape is
 * all-zero there.
 */
export function encode(src: string, extensions: Extension[] = []): Op[] {
    checkExtensions(extensions)
    const text = sanitize(src, extensions)
    const res: Op[] = []
    for (let i = 0; i < text.length;) {
        const idiom = idioms[text.slice(i, i + 3)]
        if (idiom !== undefined) {
            res.push(ir.op(idiom))
            i += 3
            continue
        }
        const ch = text[i++]
        const opcode = opcodes[ch]
        res.push(opcode === undefined ? ir.ext(ch) : ir.op(opcode))
    }
    return dropDeadPrefix(dropUnmatched(res))
}

export function dropUnmatched(ops: Op[]) {
    const partner = matchLoops(ops)
    return ops.filter((op, i) => !ir.isLoopMarker(op) || partner[i] >= 0)
}

export function matchLoops(ops: Op[]) {
    return U.matchPairs(ops, op => op.opcode == OpCode.loopOpen, op => op.opcode == OpCode.loopClose)
}

// expects balanced loop markers
export function dropDeadPrefix(ops: Op[]) {
    let start = 0
    if (ops.length && ops[0].opcode == OpCode.loopOpen) {
        const partner = matchLoops(ops)
        while (start < ops.length && ops[start].opcode == OpCode.loopOpen) {
            U.assert(partner[start] > start, "unbalanced loop")
            start = partner[start] + 1
        }
    }
    return start ? ops.slice(start) : ops
}
