import { checkExtensions, encode } from './encoder'
import { countedDivisor, toProgram } from './emit'
import { encodeRepeats, foldRuns } from './fold'
import * as ir from './ir'
import { type Op, OpCode } from './ir'
import * as L from './library'
import type { EofMode, Extension } from './library'
import { reduceLoops } from './loops'
import { fuse } from './peephole'
import { literalInput, type Program } from './runtime'
import * as U from './util'

export interface Options {
    // literal input, read (with a terminating 0) before any line is requested from the runtime
    input?: string | ArrayLike<number>
    extensions?: Extension[]
    eof?: EofMode
    optimize?: boolean
    verbose?: boolean
}

export interface CompileStats {
    // source-level instructions after encoding
    sourceOps: number
    foldedOps: number
    tokens: number
    reducedLoops: number
    keptLoops: number
    statements: number
}

export interface CompileResult {
    // function expression taking the runtime
    js: string
    execute: Program
    ops: Op[]
    options: Options
    stats: CompileStats
    info: string
}

function numStatements(ops: Op[]): number {
    let n = 0
    for (const op of ops) {
        if (op.opcode == OpCode.reduced)
            n += numStatements(op.body || []) + (countedDivisor(op) ? 1 : 0)
        else if (op.opcode == OpCode.addMove)
            n += 2
        else
            n++
    }
    return n
}

export function compileProgram(src: string, opts: Options = {}): CompileResult {
    opts = U.flatClone(opts)
    if (opts.optimize === undefined)
        opts.optimize = true
    const eof = opts.eof || "halt"
    opts.eof = eof
    const extensions = opts.extensions || []
    checkExtensions(extensions)

    let ops = encode(src, extensions)
    const stats: CompileStats = {
        sourceOps: ops.length,
        foldedOps: ops.length,
        tokens: ops.length,
        reducedLoops: 0,
        keptLoops: ir.numLoops(ops),
        statements: 0,
    }

    if (opts.optimize) {
        ops = foldRuns(ops)
        stats.foldedOps = ops.length
        if (opts.verbose)
            console.log(`fold: ${stats.sourceOps} -> ${stats.foldedOps} ops`)

        ops = encodeRepeats(ops)
        stats.tokens = ops.length
        if (opts.verbose)
            console.log(`repeats: ${stats.foldedOps} -> ${stats.tokens} tokens`)

        const red = reduceLoops(ops)
        ops = red.ops
        stats.reducedLoops = red.reduced
        stats.keptLoops = red.kept
        if (opts.verbose)
            console.log(`loops: ${red.reduced} reduced, ${red.kept} kept`)

        ops = fuse(ops)
        if (opts.verbose)
            console.log("fused: " + ir.stringify(ops))
    }

    stats.statements = numStatements(ops)

    const info = `${stats.sourceOps} instructions -> ${stats.statements} statements; ` +
        `loops: ${stats.reducedLoops} reduced, ${stats.keptLoops} kept`
    if (opts.verbose)
        console.log(info)

    const js = toProgram(ops, literalInput(opts.input), { eof, extensions })
    // evaluated on first use
    let program: Program | undefined
    const execute: Program = rt => {
        const f: Program = program || (program = (0, eval)(js))
        return f(rt)
    }

    return {
        js,
        execute,
        ops,
        options: opts,
        stats,
        info,
    }
}

/**
 * Compile source text to the text of a JavaScript function expression
 * `((rt) => { ... })`. Characters outside the alphabet are ignored.
 */
export function compile(src: string, input?: string | ArrayLike<number>, extensions: Extension[] = []) {
    return compileProgram(src, { input, extensions }).js
}

// Node.js script reading stdin and writing stdout
export function toStandalone(cres: CompileResult) {
    return L.standaloneWrapper(`// ${cres.info}\n${cres.js}`)
}
