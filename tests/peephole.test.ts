import { describe, expect, it } from "vitest"
import { encode } from "../src/encoder"
import { encodeRepeats, foldRuns } from "../src/fold"
import { stringify } from "../src/ir"
import { reduceLoops } from "../src/loops"
import { advanceUpdate, fuse, offsetUpdate, updateAdvance } from "../src/peephole"

function tokens(src: string) {
    return reduceLoops(encodeRepeats(foldRuns(encode(src)))).ops
}

function fused(src: string) {
    return stringify(fuse(tokens(src)))
}

describe("rules", () => {
    it("match at the given position only", () => {
        const ops = tokens("+>>>-<<<")
        expect(offsetUpdate(ops, 0)).toBeNull()
        expect(offsetUpdate(ops, 1)?.len).toBe(3)
        expect(updateAdvance(ops, 1)).toBeNull()
        expect(advanceUpdate(ops, 1)?.len).toBe(2)
    })
})

describe("fuse", () => {
    it("updates a cell at an offset", () => {
        expect(fused(">>>+++<<<")).toBe("@3+3")
        expect(fused("<[-]>")).toBe("@-1=0")
    })

    it("needs the move back to match the move out", () => {
        expect(fused(">>+<")).toBe("2+1 <")
    })

    it("updates then advances by one", () => {
        expect(fused("++>")).toBe("+2>")
        expect(fused("-<")).toBe("-1<")
        expect(fused("+>>")).toBe("+ 2>")
    })

    it("advances then updates", () => {
        expect(fused(">>>-")).toBe("3-1")
        expect(fused("<<[-]")).toBe("-2=0")
    })

    it("applies rules in precedence order", () => {
        expect(fused(">+<")).toBe("@1+1")
        expect(fused("+>+")).toBe("+1> +")
    })

    it("treats reduced loops as opaque", () => {
        expect(fused("+[->+<]")).toBe("+ {@1+=1/1 @0=0}")
    })

    it("fuses inside loops that were kept", () => {
        expect(fused("+[>+<.]")).toBe("+ [ @1+1 . ]")
    })
})
