export interface SMap<T> {
    [index: string]: T
}

export function assert(cond: boolean, msg = "Assertion failed") {
    if (!cond) {
        debugger
        throw new Error(msg)
    }
}

export type UserError = Error & { isUserError: true }

export function userError(msg: string): never {
    const e: UserError = Object.assign(new Error(msg), { isUserError: true as const })
    throw e
}

export function isUserError(e: unknown): e is UserError {
    return e instanceof Error && "isUserError" in e && e.isUserError === true
}

export function oops(msg = "OOPS"): never {
    debugger
    throw new Error(msg)
}

export function flatClone<T extends object>(v: T): T {
    return Object.assign({}, v)
}

// number of trailing zero bits of a non-zero integer
export function trailingZeros(n: number) {
    let k = 0
    while ((n & 1) == 0 && k < 32) {
        n >>= 1
        k++
    }
    return k
}

// multiplicative inverse of an odd integer modulo 2^32, as an int32
export function inverseOdd(m: number) {
    assert((m & 1) == 1, "inverseOdd() of even number")
    let inv = m | 0
    // each step doubles the number of correct low bits, starting at 3
    for (let i = 0; i < 4; ++i)
        inv = Math.imul(inv, 2 - Math.imul(m, inv))
    return inv
}

/**
 * Pair up opening and closing items the way brackets nest. The result holds
 * the partner index of every opener and closer, and -1 for unmatched ones
 * and for anything else.
 */
export function matchPairs<T>(items: ArrayLike<T>, isOpen: (v: T) => boolean, isClose: (v: T) => boolean) {
    const partner: number[] = []
    const stack: number[] = []
    for (let i = 0; i < items.length; ++i) {
        partner.push(-1)
        if (isOpen(items[i])) {
            stack.push(i)
        } else if (isClose(items[i])) {
            const j = stack.pop()
            if (j !== undefined) {
                partner[i] = j
                partner[j] = i
            }
        }
    }
    return partner
}

let seed = 13 * 0x1000193

export function seedRandom(v: number) {
    seed = (v * 0x1000193) >>> 0
}

export function randomUint32() {
    let x = seed;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    x >>>= 0;
    seed = x;
    return x;
}

export function randomInclusive(min: number, max: number) {
    return min + randomUint32() % (max - min + 1)
}

export function randomPick<T>(arr: T[]): T {
    assert(arr.length > 0, "randomPick() on empty array")
    return arr[randomUint32() % arr.length];
}
