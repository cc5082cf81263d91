import { sanitize } from './encoder'
import { type EofMode, TAPE_ORIGIN, TAPE_SIZE } from './library'
import { literalInput, type Runtime, toBytes } from './runtime'
import * as U from './util'

export interface InterpretOptions {
    input?: string | ArrayLike<number>
    eof?: EofMode
    // stop after this many instructions
    maxSteps?: number
}

export interface MachineState {
    status: "done" | "halted" | "limit"
    tape: Int32Array
    pointer: number
    steps: number
}

/**
 * Run the source one instruction at a time, with the same tape, input and
 * output contract as compiled programs. Used as the reference when
 * validating compilations. Unmatched brackets do nothing.
 */
export function interpret(src: string, rt: Runtime, opts: InterpretOptions = {}): MachineState {
    const code = sanitize(src)
    const jump = U.matchPairs(code, c => c == "[", c => c == "]")
    const eof = opts.eof || "halt"
    const maxSteps = opts.maxSteps == null ? Infinity : opts.maxSteps

    const tape = new Int32Array(TAPE_SIZE)
    let p = TAPE_ORIGIN
    let inp = literalInput(opts.input)
    let ic = 0
    let steps = 0

    const state = (status: MachineState["status"]): MachineState =>
        ({ status, tape, pointer: p - TAPE_ORIGIN, steps })

    const readByte = () => {
        if (ic >= inp.length) {
            const line = rt.readLine()
            if (line == null)
                return -1
            inp = toBytes(line)
            inp.push(0)
            ic = 0
        }
        return inp[ic++]
    }

    for (let pc = 0; pc < code.length; ++pc) {
        if (++steps > maxSteps)
            return state("limit")
        switch (code[pc]) {
            case "+":
                tape[p]++
                break
            case "-":
                tape[p]--
                break
            case ">":
                p++
                break
            case "<":
                p--
                break
            case "[":
                if (!tape[p] && jump[pc] >= 0)
                    pc = jump[pc]
                break
            case "]":
                if (tape[p] && jump[pc] >= 0)
                    pc = jump[pc]
                break
            case ".":
                rt.write(tape[p])
                break
            case ",": {
                const b = readByte()
                if (b >= 0)
                    tape[p] = b
                else if (eof == "halt")
                    return state("halted")
                else if (eof == "zero")
                    tape[p] = 0
                break
            }
        }
    }

    return state("done")
}
