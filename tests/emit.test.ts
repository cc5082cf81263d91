import { describe, expect, it } from "vitest"
import { type EmitOptions, iterationCount, toJS, toJSs, toProgram } from "../src/emit"
import * as ir from "../src/ir"
import { OpCode } from "../src/ir"
import { dumpExtension } from "../src/library"

const opts: EmitOptions = { eof: "halt", extensions: [] }

function js(op: ir.Op, o = opts) {
    return toJS(op, o)
}

describe("toJS", () => {
    it("emits source-level instructions", () => {
        expect(js(ir.op(OpCode.inc))).toBe("d[p]++;\n")
        expect(js(ir.op(OpCode.inc, 3))).toBe("d[p] += 3;\n")
        expect(js(ir.op(OpCode.dec, 2))).toBe("d[p] -= 2;\n")
        expect(js(ir.op(OpCode.right))).toBe("p++;\n")
        expect(js(ir.op(OpCode.left, 4))).toBe("p -= 4;\n")
        expect(js(ir.op(OpCode.clear))).toBe("d[p] = 0;\n")
        expect(js(ir.op(OpCode.scanRight))).toBe("while (d[p]) p++;\n")
        expect(js(ir.op(OpCode.scanLeft))).toBe("while (d[p]) p--;\n")
        expect(js(ir.op(OpCode.output))).toBe("rt.write(d[p]);\n")
    })

    it("emits input for each end-of-input mode", () => {
        const input = ir.op(OpCode.input)
        expect(js(input)).toBe("if ((b = readByte()) < 0) return done(); d[p] = b;\n")
        expect(js(input, { eof: "zero", extensions: [] })).toBe("b = readByte(); d[p] = b < 0 ? 0 : b;\n")
        expect(js(input, { eof: "unchanged", extensions: [] })).toBe("if ((b = readByte()) >= 0) d[p] = b;\n")
    })

    it("emits fused statements", () => {
        expect(js(ir.addAt(3, 2))).toBe("d[p + 3] += 2;\n")
        expect(js(ir.addAt(-1, -1))).toBe("d[p - 1]--;\n")
        expect(js(ir.clearAt(-2))).toBe("d[p - 2] = 0;\n")
        expect(js(ir.addMove(2, 1))).toBe("d[p] += 2;\np++;\n")
        expect(js(ir.moveAdd(3, -1))).toBe("d[p += 3]--;\n")
        expect(js(ir.moveAdd(1, 2))).toBe("d[++p] += 2;\n")
        expect(js(ir.moveClear(-1))).toBe("d[--p] = 0;\n")
        expect(js(ir.moveClear(-3))).toBe("d[p -= 3] = 0;\n")
    })

    it("emits scaled updates", () => {
        expect(js(ir.mulAdd(1, 1, 1))).toBe("d[p + 1] += d[p];\n")
        expect(js(ir.mulAdd(1, -1, 1))).toBe("d[p + 1] -= d[p];\n")
        expect(js(ir.mulAdd(2, 3, 1))).toBe("d[p + 2] += d[p] * 3;\n")
        expect(js(ir.mulAdd(1, 2, -1))).toBe("d[p + 1] -= d[p] * 2;\n")
        expect(js(ir.mulAdd(1, -1, -1))).toBe("d[p + 1] += d[p];\n")
        expect(js(ir.mulAdd(1, 1, 2))).toBe("d[p + 1] += n;\n")
        expect(js(ir.mulAdd(-1, -1, 3))).toBe("d[p - 1] -= n;\n")
        expect(js(ir.mulAdd(1, 3, 2))).toBe("d[p + 1] += Math.imul(n, 3);\n")
    })

    it("computes iteration counts", () => {
        expect(iterationCount(2)).toBe("d[p] >>> 1")
        expect(iterationCount(4)).toBe("d[p] >>> 2")
        expect(iterationCount(3)).toBe("Math.imul(d[p], -1431655765) >>> 0")
        expect(iterationCount(-3)).toBe("Math.imul(d[p], 1431655765) >>> 0")
        expect(iterationCount(5)).toBe("Math.imul(d[p], -858993459) >>> 0")
        expect(iterationCount(-2)).toBe("Math.imul(d[p] >>> 1, -1) & 0x7fffffff")
        expect(iterationCount(6)).toBe("Math.imul(d[p] >>> 1, -1431655765) & 0x7fffffff")
    })

    it("emits guarded updates", () => {
        expect(js(ir.condAdd(2, 1))).toBe("if (d[p]) d[p + 2]++;\n")
        expect(js(ir.condAdd(1, -5))).toBe("if (d[p]) d[p + 1] -= 5;\n")
        expect(js(ir.condClear(1))).toBe("if (d[p]) d[p + 1] = 0;\n")
    })

    it("emits the body of a reduced loop", () => {
        expect(js(ir.reduced([ir.mulAdd(1, 1, 1), ir.clearAt(0)]))).toBe("d[p + 1] += d[p];\nd[p] = 0;\n")
        expect(js(ir.reduced([ir.mulAdd(1, 1, 2), ir.condClear(2), ir.clearAt(0)])))
            .toBe("n = d[p] >>> 1;\nd[p + 1] += n;\nif (d[p]) d[p + 2] = 0;\nd[p] = 0;\n")
    })

    it("emits extension templates", () => {
        expect(js(ir.ext("#"), { eof: "halt", extensions: [dumpExtension] })).toBe(dumpExtension.template + "\n")
        expect(() => js(ir.ext("!"))).toThrow("no template for extension !")
    })
})

describe("toJSs", () => {
    it("indents loop bodies", () => {
        const ops = [ir.op(OpCode.loopOpen), ir.op(OpCode.inc), ir.op(OpCode.loopClose)]
        expect(toJSs(ops, opts)).toBe("while (d[p]) {\n    d[p]++;\n}\n")
    })

    it("indents every line of a reduced loop", () => {
        const ops = [ir.op(OpCode.loopOpen), ir.reduced([ir.mulAdd(1, 1, 1), ir.clearAt(0)]), ir.op(OpCode.loopClose)]
        expect(toJSs(ops, opts)).toBe("while (d[p]) {\n    d[p + 1] += d[p];\n    d[p] = 0;\n}\n")
    })
})

describe("toProgram", () => {
    it("wraps the statements in a function expression", () => {
        const prog = toProgram([ir.op(OpCode.output)], [7, 8], opts)
        expect(prog.startsWith("((rt) => {\n    \"use strict\";\n")).toBe(true)
        expect(prog).toContain("\n    let inp = [7, 8];\n")
        expect(prog).toContain("\n    rt.write(d[p]);\n")
        expect(prog.endsWith("\n    return done();\n})")).toBe(true)
    })
})
