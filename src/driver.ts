import { type CompileResult, compileProgram, type Options } from './compiler';
import { interpret } from './interpreter';
import { mkRuntime } from './runtime';
import * as U from './util'

export interface TestCase {
    src: string
    // lines handed out by the runtime once the literal input is used up
    lines?: string[]
}

function show(bytes: Uint8Array) {
    return JSON.stringify(Buffer.from(bytes).toString("latin1"))
}

/**
 * Run the compiled program and the reference interpreter on the same input
 * and check that they produce the same bytes.
 */
export function validateCompilation(tc: TestCase, cres: CompileResult) {
    const opts = cres.options
    const rtJS = mkRuntime(tc.lines)
    cres.execute(rtJS)
    const rtRef = mkRuntime(tc.lines)
    interpret(tc.src, rtRef, { input: opts.input, eof: opts.eof })

    const res = rtRef.bytes()
    const res2 = rtJS.bytes()
    if (opts.verbose)
        console.log("Test output", show(res2))

    let numerr = 0
    for (let i = 0; i < Math.max(res.length, res2.length); ++i) {
        if (res[i] !== res2[i]) {
            console.log(`at ${i} ${res[i]}[exp] - ${res2[i]}`)
            numerr++
            if (numerr > 5) break
        }
    }
    if (numerr)
        throw new Error("mismatch")
}

export function compileAndTest(tc: TestCase, options: Options = {}) {
    let cres: CompileResult | undefined
    try {
        cres = compileProgram(tc.src, options)
        validateCompilation(tc, cres)
        return cres
    } catch (e) {
        if (!cres || !options.verbose) {
            options = U.flatClone(options)
            options.verbose = true
            cres = compileProgram(tc.src, options)
        }
        console.log(cres.js)
        console.log("Failing program: ", tc.src)
        throw e
    }
}
