import { z } from "zod";

import { parseOptions } from "./config.js";
import { resolveName, tagWrapped } from "./wrapped.js";

const memorizeOptionsSchema = z.object({
    maxSize: z.number().int().positive().optional(),
});

/**
 * One node per argument position. Keys compare with `Map` semantics
 * (SameValueZero), so objects hit only when the same instance is passed.
 */
interface CacheNode<R> {
    parent?: CacheNode<R>;
    key?: unknown;
    children: Map<unknown, CacheNode<R>>;
    entry?: { value: R };
}

/**
 * Argument-list keyed cache with optional least-recently-used eviction.
 */
class ArgumentCache<R> implements Decorators.CacheHandle {
    private root: CacheNode<R> = { children: new Map() };
    // insertion order doubles as recency order
    private recency = new Set<CacheNode<R>>();

    constructor(private maxSize?: number) { }

    get size(): number {
        return this.recency.size;
    }

    lookup(args: readonly unknown[]): { value: R } | undefined {
        let node: CacheNode<R> | undefined = this.root;
        for (const arg of args) {
            node = node.children.get(arg);
            if (!node) return undefined;
        }
        if (!node.entry) return undefined;

        this.recency.delete(node);
        this.recency.add(node);
        return node.entry;
    }

    store(args: readonly unknown[], value: R): void {
        let node = this.root;
        for (const arg of args) {
            let next = node.children.get(arg);
            if (!next) {
                next = { parent: node, key: arg, children: new Map() };
                node.children.set(arg, next);
            }
            node = next;
        }

        node.entry = { value };
        this.recency.delete(node);
        this.recency.add(node);

        if (this.maxSize !== undefined && this.recency.size > this.maxSize) {
            const oldest = this.recency.values().next();
            if (!oldest.done) this.evict(oldest.value);
        }
    }

    /**
     * Drops the entry for `args` if it still holds `value`.
     */
    forget(args: readonly unknown[], value: R): void {
        let node: CacheNode<R> | undefined = this.root;
        for (const arg of args) {
            node = node.children.get(arg);
            if (!node) return;
        }
        if (node.entry && node.entry.value === value) this.evict(node);
    }

    clear(): void {
        this.root = { children: new Map() };
        this.recency.clear();
    }

    private evict(node: CacheNode<R>): void {
        this.recency.delete(node);
        node.entry = undefined;

        let current = node;
        while (current.parent && !current.entry && current.children.size === 0) {
            current.parent.children.delete(current.key);
            current = current.parent;
        }
    }
}

/**
 * Caches results by positional argument list. Without `maxSize` the cache
 * grows for as long as the memoized function lives; only use it on
 * deterministic functions. A returned promise is cached as is and dropped
 * again if it rejects.
 */
export function memorize<A extends unknown[], R>(
    fn: (...args: A) => R,
    config: Decorators.MemorizeOptions = {}
): Decorators.Memoized<A, R> {
    const { maxSize } = parseOptions(memorizeOptionsSchema, { maxSize: config.maxSize }, "memorize");
    const cache = new ArgumentCache<R>(maxSize);

    const wrapper = tagWrapped((...args: A): R => {
        const hit = cache.lookup(args);
        if (hit) return hit.value;

        const result = fn(...args);
        cache.store(args, result);
        // a rejected promise must not be replayed to later callers
        if (result instanceof Promise) {
            void result.then(undefined, () => cache.forget(args, result));
        }
        return result;
    }, resolveName(fn, config.name));

    return Object.assign(wrapper, { cache });
}
