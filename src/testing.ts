import { type Options } from './compiler';
import { compileAndTest, type TestCase } from './driver';
import { interpret } from './interpreter';
import { mkRuntime } from './runtime';
import * as U from './util'

export interface SampleProgram extends TestCase {
    name: string
    options?: Options
}

function getSamplePrograms(): U.SMap<SampleProgram> {
    const list: SampleProgram[] = [
        {
            name: "hi",
            src: "++++++++[>+++++++++<-]>.+.",
        },
        {
            name: "echo",
            src: ",[.,]",
            options: { input: "echo" },
        },
        {
            name: "add",
            src: ",>,[<+>-]<" + "-".repeat(48) + ".",
            options: { input: "34" },
        },
        {
            name: "nested",
            src: "++++[>++++[>++++<-]<-]>>.",
        },
        {
            name: "halve",
            src: "+".repeat(130) + "[-->+<]>.",
        },
        {
            name: "countUp",
            src: "-----[+>++<]>.",
        },
        {
            name: "scan",
            src: ">+>++>+++>++++[<]>[.>]",
        },
        {
            name: "reverse",
            src: ">,[>,]<[.<]",
            options: { input: "abc" },
        },
        {
            name: "lines",
            src: ",[.,]",
            options: { eof: "zero" },
            lines: ["first", "second"],
        },
        {
            name: "once",
            src: "+++[>+++<[-]>>++<<]>.>.",
        },
    ]
    const r: U.SMap<SampleProgram> = {}
    for (const p of list)
        r[p.name] = p
    return r
}

let _programs: U.SMap<SampleProgram> | undefined

function programs() {
    if (!_programs) _programs = getSamplePrograms()
    return _programs
}

export function allSamplePrograms() {
    return Object.keys(programs()).map(sampleProgram)
}

export function sampleProgram(id: string) {
    const progs = programs()
    const prog = progs[id]
    if (!prog) {
        let msg = `no such program ${id}; options:\n`
        for (const name of Object.keys(progs)) {
            msg += `- ${name}: ${progs[name].src.length} chars\n`
        }
        throw new Error(msg)
    }
    return prog
}

function randomBlock(depth: number): string {
    let r = ""
    const n = U.randomInclusive(1, 6)
    for (let i = 0; i < n; ++i) {
        switch (U.randomInclusive(0, depth < 3 ? 9 : 6)) {
            case 0:
            case 1:
                r += "+".repeat(U.randomInclusive(1, 12))
                break
            case 2:
                r += "-".repeat(U.randomInclusive(1, 4))
                break
            case 3:
                r += ">".repeat(U.randomInclusive(1, 3))
                break
            case 4:
                r += "<".repeat(U.randomInclusive(1, 3))
                break
            case 5:
                r += U.randomPick([".", ".", ",", "[-]", "[>]", "[<]"])
                break
            case 6:
                r += U.randomPick(["+-", "-+", "><", "<>"])
                break
            default: {
                // mostly counted loops over the cell at the pointer
                const k = U.randomInclusive(1, 3)
                const body = randomBlock(depth + 1)
                const away = ">".repeat(k) + body + "<".repeat(k)
                r += U.randomPick([`[-${away}]`, `[${away}-]`, `[${body}]`, `[--${away}]`])
                break
            }
        }
    }
    return r
}

/**
 * Random program over the whole instruction set, with literal input.
 * It may well not terminate; see `terminates()`.
 */
export function randomProgram(): SampleProgram {
    const len = U.randomInclusive(1, 5)
    let src = ""
    for (let i = 0; i < len; ++i)
        src += randomBlock(0)
    let input = ""
    for (let i = U.randomInclusive(0, 4); i > 0; --i)
        input += String.fromCharCode(U.randomInclusive(1, 20))
    return { name: "random", src, options: { input, eof: "zero" } }
}

export function terminates(prog: SampleProgram, maxSteps = 50000) {
    const opts = prog.options || {}
    const st = interpret(prog.src, mkRuntime(prog.lines), { input: opts.input, eof: opts.eof, maxSteps })
    return st.status != "limit"
}

function testProgram(prog: SampleProgram, opts: Options) {
    const o: Options = Object.assign(U.flatClone(opts), prog.options || {})
    compileAndTest(prog, o)
    o.optimize = !o.optimize
    compileAndTest(prog, o)
}

/**
 * Validate every sample program, and `numRandom` random ones that
 * terminate, against the interpreter, with and without optimization.
 * Returns the number of random programs checked.
 */
export function testAllPrograms(opts: Options = {}, numRandom = 200, seed = 220) {
    const t0 = Date.now()
    for (const p of allSamplePrograms()) {
        if (opts.verbose)
            console.log(`*** ${p.name}`)
        testProgram(p, opts)
    }

    U.seedRandom(seed)
    let checked = 0
    for (let i = 0; i < numRandom; ++i) {
        const p = randomProgram()
        if (!terminates(p))
            continue
        if (opts.verbose)
            console.log(`*** random: ${p.src}`)
        testProgram(p, opts)
        checked++
    }

    if (opts.verbose)
        console.log(`\n*** All OK (${Date.now() - t0}ms, ${checked} random programs)\n`)
    return checked
}
