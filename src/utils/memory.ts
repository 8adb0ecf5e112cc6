/**
 * Asks V8 for a full collection. Only does something when node runs with
 * `--expose-gc` (the `start` script passes it); otherwise a no-op.
 */
export function releaseMemory(): void {
    const gc: unknown = Reflect.get(globalThis, 'gc')
    if (typeof gc === 'function') gc()
}
