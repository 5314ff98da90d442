type Named = { readonly name: string } & object;

/**
 * Name reported for `fn` in messages: an explicit override, else the name a
 * previous decorator recorded, else the function's own name.
 */
export function resolveName(fn: Named, override?: string): string {
    if (override) return override;
    if ("wrappedName" in fn && typeof fn.wrappedName === "string") return fn.wrappedName;
    return fn.name || "anonymous";
}

/**
 * Attaches the explicit name metadata to a wrapper.
 */
export function tagWrapped<A extends unknown[], R>(
    wrapper: (...args: A) => R,
    name: string
): Decorators.Wrapped<A, R> {
    return Object.assign(wrapper, { wrappedName: name });
}
