declare namespace Decorators {

    /**
     * A wrapper produced by one of the decorators. `wrappedName` is the name
     * of the innermost decorated function, carried explicitly so stacked
     * decorators keep reporting it.
     */
    type Wrapped<A extends unknown[], R> = ((...args: A) => R) & {
        readonly wrappedName: string
    }

    type Decorator<Out extends "sync" | "async"> = <A extends unknown[], R>(
        fn: (...args: A) => R
    ) => Wrapped<A, Out extends "async" ? Promise<Awaited<R>> : R>

    interface CacheHandle {
        readonly size: number
        clear(): void
    }

    type Memoized<A extends unknown[], R> = Wrapped<A, R> & {
        readonly cache: CacheHandle
    }

    /**
     * Leveled sink the decorators log through. A pino `Logger` satisfies it.
     */
    interface LogSink {
        debug(bindings: Record<string, unknown>, message: string): void
        info(bindings: Record<string, unknown>, message: string): void
        warn(bindings: Record<string, unknown>, message: string): void
    }

    export type HttpBody =
        | { json: unknown }
        | { data: string };

    interface HttpClient {
        post(url: string, body: HttpBody): Promise<void>
    }

    export type NamedOptions = {
        name?: string;
    };

    export type LoggedOptions = NamedOptions & {
        logger?: LogSink;
    };

    export type NotifierOptions = NamedOptions & {
        http?: HttpClient;
    };

    export type RetryOptions = LoggedOptions & {
        maxTries?: number;
        delaySeconds?: number;
    };

    export type TimingOptions = LoggedOptions & {
        log?: boolean;
        nanoSeconds?: boolean;
    };

    export type MemorizeOptions = NamedOptions & {
        maxSize?: number;
    };

    /**
     * `null` sends nothing, the keyword sends the captured value, any other
     * string is sent as is.
     */
    export type NtfyOptions = NotifierOptions & {
        onCompletion?: "results" | (string & {}) | null;
        onError?: "error" | (string & {}) | null;
    };
}
