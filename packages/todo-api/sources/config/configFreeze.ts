/**
 * Freezes a resolved config and every object or array reachable from it.
 * Shared or cyclic references are visited once.
 */
export function configFreeze<T extends object>(config: T): T {
    const visited = new WeakSet<object>();
    const pending: object[] = [config];
    let current = pending.pop();
    while (current !== undefined) {
        if (!visited.has(current)) {
            visited.add(current);
            Object.freeze(current);
            for (const child of Object.values(current)) {
                if (typeof child === "object" && child !== null) {
                    pending.push(child);
                }
            }
        }
        current = pending.pop();
    }
    return config;
}
