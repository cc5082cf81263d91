import { describe, expect, it } from "vitest"
import { toJSs } from "../src/emit"
import { encode } from "../src/encoder"
import { encodeRepeats, foldRuns } from "../src/fold"
import { stringify } from "../src/ir"
import { reduceLoop, reduceLoops } from "../src/loops"

function tokens(src: string) {
    return encodeRepeats(foldRuns(encode(src)))
}

function reduce(body: string) {
    const r = reduceLoop(tokens(body))
    return r ? stringify([r]) : null
}

// runs the code of a reduced loop on a small tape, returning the final pointer
function runReduced(body: string, tape: Int32Array, p: number): number {
    const r = reduceLoop(tokens(body))
    expect(r).not.toBeNull()
    const code = toJSs(r ? [r] : [], { eof: "halt", extensions: [] })
    const f = new Function("d", "p", "let n = 0;\n" + code + "\nreturn p;")
    return f(tape, p)
}

describe("reduceLoop", () => {
    it("reduces the copy idiom", () => {
        expect(reduce("->+>+<<")).toBe("{@1+=1/1 @2+=1/1 @0=0}")
    })

    it("divides by the net decrement of the origin", () => {
        expect(reduce(">+<-->>+<<--->+<")).toBe("{@1+=1/5 @2+=1/5 @1+=1/5 @0=0}")
        expect(reduce("-->+++<")).toBe("{@1+=3/2 @0=0}")
        expect(reduce("---->++<")).toBe("{@1+=2/4 @0=0}")
    })

    it("handles an incrementing origin", () => {
        expect(reduce("+>++<")).toBe("{@1+=2/-1 @0=0}")
    })

    it("guards clears of other cells", () => {
        expect(reduce(">[-]<-")).toBe("{@1?=0 @0=0}")
    })

    it("runs a body that clears the origin at most once", () => {
        expect(reduce("[-]>+++<")).toBe("{@1?+3 @0=0}")
        expect(reduce("-[-]>+<")).toBe("{@1?+1 @0=0}")
    })

    it("adds constants to cells cleared earlier in the body", () => {
        expect(reduce("->[-]+<")).toBe("{@1?=0 @1?+1 @0=0}")
    })

    it("leaves other loops alone", () => {
        // pointer drift
        expect(reduce("->+")).toBeNull()
        // input and output
        expect(reduce("-.")).toBeNull()
        expect(reduce("-,")).toBeNull()
        // origin never changes
        expect(reduce(">+<")).toBeNull()
        // zero net change of the origin
        expect(reduce("->+<+")).toBeNull()
        // origin set after its clear
        expect(reduce("[-]+")).toBeNull()
        expect(reduce("->[>]<")).toBeNull()
    })
})

describe("reduced code", () => {
    it("never moves the pointer", () => {
        for (const body of ["->+>+<<", ">+<-->>+<<--->+<", "+>++<", ">[-]<-", "[-]>+++<", "->[-]+<"]) {
            const tape = new Int32Array(64)
            tape[32] = 6
            expect(runReduced(body, tape, 32)).toBe(32)
            expect(tape[32]).toBe(0)
        }
    })

    it("computes the final cell values", () => {
        const tape = new Int32Array(64)
        tape[32] = 6
        runReduced("->+>+<<", tape, 32)
        expect(Array.from(tape.subarray(32, 35))).toEqual([0, 6, 6])

        const tape2 = new Int32Array(64)
        tape2[32] = 10
        runReduced(">+<-->>+<<--->+<", tape2, 32)
        expect(Array.from(tape2.subarray(32, 35))).toEqual([0, 4, 2])
    })

    it("counts iterations modulo 2^32", () => {
        // 1 - 3n == 0 for n = 0xaaaaaaab
        const tape = new Int32Array(64)
        tape[32] = 1
        runReduced("--->+<", tape, 32)
        expect(tape[33]).toBe(0xaaaaaaab | 0)

        // -2 - 2n == 0 for n = 0x7fffffff
        const tape2 = new Int32Array(64)
        tape2[32] = -2
        runReduced("-->+<", tape2, 32)
        expect(tape2[33]).toBe(0x7fffffff)

        const tape3 = new Int32Array(64)
        tape3[32] = 130
        runReduced("-->+<", tape3, 32)
        expect(tape3[33]).toBe(65)
    })

    it("skips guarded statements when the origin is zero", () => {
        const tape = new Int32Array(64)
        tape[33] = 7
        runReduced("->[-]+<", tape, 32)
        expect(tape[33]).toBe(7)
    })
})

describe("reduceLoops", () => {
    it("reduces innermost loops only", () => {
        const r = reduceLoops(tokens("+[>+[->+<]<-]"))
        expect(stringify(r.ops)).toBe("+ [ > + {@1+=1/1 @0=0} < - ]")
        expect(r.reduced).toBe(1)
        expect(r.kept).toBe(1)
    })

    it("reduces sibling loops", () => {
        const r = reduceLoops(tokens("+[->+<]>[-<+>]"))
        expect(stringify(r.ops)).toBe("+ {@1+=1/1 @0=0} > {@-1+=1/1 @0=0}")
        expect(r.reduced).toBe(2)
        expect(r.kept).toBe(0)
    })

    it("keeps loops with output", () => {
        const r = reduceLoops(tokens("+[.-]"))
        expect(stringify(r.ops)).toBe("+ [ . - ]")
        expect(r.reduced).toBe(0)
        expect(r.kept).toBe(1)
    })
})
