import * as fs from 'fs'
import * as path from 'path'
import { program as commander } from "commander"
import {
    compileAndTest,
    compileProgram,
    dumpExtension,
    eofModes,
    isUserError,
    mkStdioRuntime,
    type Options,
    testAllPrograms,
    toStandalone,
    userError,
    type EofMode,
    type Extension,
} from '../../src/main'

interface CmdOptions {
    debug?: boolean
    output?: string
    basename?: string
    input?: string
    run?: boolean
    optimize?: boolean
    eof?: string
    extension: string[]
    dump?: boolean
    validate?: boolean
    selfTest?: boolean
}

let options: CmdOptions

function isEofMode(s: string): s is EofMode {
    return eofModes.some(m => m == s)
}

function parseExtension(def: string): Extension {
    const eq = def.indexOf("=")
    if (eq != 1)
        userError(`bad extension '${def}'; expected <symbol>=<statement>`)
    return { symbol: def[0], template: def.slice(2) }
}

function parseEof(s: string): EofMode {
    if (isEofMode(s))
        return s
    return userError(`bad --eof '${s}'; expected one of: ${eofModes.join(", ")}`)
}

function getCompileOptions(): Options {
    const eof = options.eof === undefined ? undefined : parseEof(options.eof)
    const extensions = options.extension.map(parseExtension)
    if (options.dump)
        extensions.push(dumpExtension)
    return {
        optimize: options.optimize,
        verbose: options.debug,
        input: options.input,
        eof,
        extensions,
    }
}

function mkdirP(thePath: string) {
    if (thePath == "." || !thePath) return;
    if (!fs.existsSync(thePath)) {
        mkdirP(path.dirname(thePath))
        fs.mkdirSync(thePath)
    }
}

function built(fn: string) {
    return path.join(options.output || "built", fn)
}

function stdioRuntime() {
    return mkStdioRuntime({
        readSync: (fd, buf, offset, length) => fs.readSync(fd, buf, offset, length, null),
        writeSync: (fd, data) => fs.writeSync(fd, data),
    })
}

function processFile(srcFile: string) {
    if (!fs.existsSync(srcFile))
        userError(`no such file: ${srcFile}`)
    const src = fs.readFileSync(srcFile, "utf8")
    const opts = getCompileOptions()

    const cres = options.validate ? compileAndTest({ src }, opts) : compileProgram(src, opts)

    mkdirP(options.output || "built")
    const basename = options.basename || path.basename(srcFile).replace(/\.[^.]*$/, "")
    const fn = built(basename + ".js")
    const buf = Buffer.from(toStandalone(cres), "utf8")
    console.error(`write ${fn} (${buf.length} bytes); ${cres.info}`)
    fs.writeFileSync(fn, buf)

    if (options.run) {
        const { rt, flush } = stdioRuntime()
        cres.execute(rt)
        flush()
    }
}

function packageVersion() {
    let dir = __dirname
    for (; ;) {
        const fn = path.join(dir, "package.json")
        if (fs.existsSync(fn)) {
            const pkg: { version?: string } = JSON.parse(fs.readFileSync(fn, "utf8"))
            return pkg.version || "0.0.0"
        }
        const up = path.dirname(dir)
        if (up == dir)
            return "0.0.0"
        dir = up
    }
}

export function mainCli() {
    commander
        .version(packageVersion())
        .option("-d, --debug", "enable debugging")
        .option("-o, --output <folder>", "path to store compilation results (default: 'built')")
        .option("-b, --basename <name>", "basename of the output file (default: source file name)")
        .option("-i, --input <text>", "literal input, read before stdin")
        .option("-r, --run", "run the compiled program")
        .option("-n, --no-optimize", "don't optimize")
        .option("-e, --eof <mode>", `end of input behavior: ${eofModes.join(", ")} (default: halt)`)
        .option("-x, --extension <sym=stmt>", "add an instruction emitting a JS statement",
            (v: string, prev: string[]) => prev.concat([v]), [])
        .option("--dump", "enable '#' to dump cells around the pointer")
        .option("-t, --validate", "compare the compiled program with the interpreter")
        .option("-T, --self-test", "validate all sample programs and random ones")
        .arguments("[program]")
        .parse(process.argv)

    options = commander.opts<CmdOptions>()

    try {
        if (options.selfTest) {
            const n = testAllPrograms({ verbose: options.debug })
            console.log(`self-test OK (${n} random programs)`)
            return
        }

        if (commander.args.length != 1)
            userError("exactly one program argument expected")

        processFile(commander.args[0])
    } catch (e) {
        if (isUserError(e)) {
            console.error(e.message)
        } else {
            console.error(e instanceof Error ? e.stack : e)
        }
        process.exitCode = 1
    }
}

if (require.main === module) mainCli()
