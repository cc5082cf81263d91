import { stdioRuntimeJS } from './library'

/**
 * Host side of a compiled program. `readLine()` returns null when there is no
 * more external input, in which case the program applies its end-of-input
 * policy.
 */
export interface Runtime {
    write: (v: number) => void
    readLine: () => string | null
    debug?: (cells: number[], pos: number) => void
}

export interface CollectingRuntime extends Runtime {
    bytes: () => Uint8Array
    text: () => string
}

export interface ProgramState {
    tape: Int32Array
    // relative to where the pointer started
    pointer: number
}

export type Program = (rt: Runtime) => ProgramState

// the parts of the `fs` module the stdio runtime uses
export interface StdioFs {
    readSync: (fd: number, buf: Uint8Array, offset: number, length: number, position: null) => number
    writeSync: (fd: number, data: Uint8Array) => number
}

export interface StdioRuntime {
    rt: Runtime
    flush: () => void
}

// the same runtime the standalone scripts use
export function mkStdioRuntime(fs: StdioFs): StdioRuntime {
    const mk: (fs: StdioFs) => StdioRuntime = (0, eval)(stdioRuntimeJS)
    return mk(fs)
}

export function mkRuntime(lines: string[] = []): CollectingRuntime {
    const out: number[] = []
    const pending = lines.slice()
    return {
        write: (v: number) => {
            out.push(v & 0xff)
        },
        readLine: () => {
            const l = pending.shift()
            return l === undefined ? null : l
        },
        bytes: () => new Uint8Array(out),
        text: () => Buffer.from(out).toString("latin1"),
    }
}

export function toBytes(input: string | ArrayLike<number>): number[] {
    if (typeof input == "string")
        return Array.from(Buffer.from(input, "utf8"))
    return Array.from(input, v => v & 0xff)
}

// what the program reads before asking the runtime for lines: the literal
// input followed by a 0, or nothing when there is no literal input
export function literalInput(input: string | ArrayLike<number> | undefined): number[] {
    if (input === undefined)
        return []
    const r = toBytes(input)
    r.push(0)
    return r
}
