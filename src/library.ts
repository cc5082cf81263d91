// Fixed JavaScript statement templates of the generated program.
// Names visible to templates: `d` (tape), `p` (pointer), `rt` (runtime),
// `inp`/`ic` (input buffer and cursor), `b` (scratch byte), `n` (iteration
// count of a reduced loop), `readByte()` and `done()`, which the program
// returns with when it finishes.

export const TAPE_SIZE = 0x20000
export const TAPE_ORIGIN = TAPE_SIZE >> 1

export type EofMode = "halt" | "zero" | "unchanged"
export const eofModes: EofMode[] = ["halt", "zero", "unchanged"]

export interface Extension {
    // single character, not one of the core instructions
    symbol: string
    // JavaScript statement(s) emitted for every occurrence of the symbol
    template: string
}

export const dumpExtension: Extension = {
    symbol: "#",
    template: `if (rt.debug) rt.debug(Array.from(d.subarray(p - 8, p + 8)), p - ${TAPE_ORIGIN});`
}

export const templates = {
    loopOpen: "while (d[p]) {",
    loopClose: "}",
    scanRight: "while (d[p]) p++;",
    scanLeft: "while (d[p]) p--;",
    output: "rt.write(d[p]);",
}

export function cell(offset: number) {
    if (offset == 0) return "d[p]"
    return offset > 0 ? `d[p + ${offset}]` : `d[p - ${-offset}]`
}

export function addTo(target: string, delta: number) {
    if (delta == 1) return `${target}++;`
    if (delta == -1) return `${target}--;`
    return delta > 0 ? `${target} += ${delta};` : `${target} -= ${-delta};`
}

export function movePtr(shift: number) {
    return addTo("p", shift)
}

// cell at the pointer after moving it by `shift`, as one index expression
export function movedCell(shift: number) {
    if (shift == 1) return "d[++p]"
    if (shift == -1) return "d[--p]"
    return shift > 0 ? `d[p += ${shift}]` : `d[p -= ${-shift}]`
}

export function inputStmt(eof: EofMode) {
    switch (eof) {
        case "halt":
            return "if ((b = readByte()) < 0) return done(); d[p] = b;"
        case "zero":
            return "b = readByte(); d[p] = b < 0 ? 0 : b;"
        case "unchanged":
            return "if ((b = readByte()) >= 0) d[p] = b;"
    }
}

export const epilogue = "return done();\n"

export function preamble(input: ArrayLike<number>) {
    return `"use strict";
const d = new Int32Array(${TAPE_SIZE});
let p = ${TAPE_ORIGIN};
let inp = [${Array.from(input).join(", ")}];
let ic = 0;
let b = 0;
let n = 0;
const done = () => ({ tape: d, pointer: p - ${TAPE_ORIGIN} });
const readByte = () => {
    if (ic >= inp.length) {
        const line = rt.readLine();
        if (line == null)
            return -1;
        inp = Array.from(new TextEncoder().encode(line));
        inp.push(0);
        ic = 0;
    }
    return inp[ic++];
};
`
}

/**
 * Function expression taking an object with `readSync` and `writeSync` (the
 * `fs` module) and returning `{ rt, flush }`: a runtime writing buffered
 * bytes to stdout and reading lines synchronously from stdin.
 */
export const stdioRuntimeJS = `((fs) => {
    const out = [];
    const flush = () => {
        if (out.length) fs.writeSync(1, Buffer.from(out.splice(0)));
    };
    const readLine = () => {
        flush();
        const chunk = Buffer.alloc(1);
        const bytes = [];
        for (;;) {
            let n = 0;
            try {
                n = fs.readSync(0, chunk, 0, 1, null);
            } catch (e) {
                if (e.code === "EAGAIN") continue;
                if (e.code !== "EOF") throw e;
            }
            if (n == 0)
                return bytes.length ? Buffer.from(bytes).toString("utf8") : null;
            if (chunk[0] == 10)
                return Buffer.from(bytes).toString("utf8");
            bytes.push(chunk[0]);
        }
    };
    const rt = {
        write: v => {
            out.push(v & 0xff);
            if (out.length >= 4096) flush();
        },
        readLine,
        debug: (cells, pos) => {
            flush();
            console.error("@" + pos + ": " + cells.join(" "));
        },
    };
    return { rt, flush };
})`

// Node.js script around a compiled program
export function standaloneWrapper(program: string) {
    return `#!/usr/bin/env node
const program = ${program};
const { rt, flush } = ${stdioRuntimeJS}(require("fs"));
program(rt);
flush();
`
}
