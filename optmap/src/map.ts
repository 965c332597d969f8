import { Equality, None, Option, Some, sameValueZero } from '../../shared/option'
import { OrElse, evaluate } from '../../shared/evaluatable'
import { Tuple2, tuple } from '../../shared/tuple'

export class KeyNotFoundError<K = unknown> extends Error {
    constructor(readonly key: K) {
        super(`Key not found: ${String(key)}`)
        this.name = "KeyNotFoundError"
    }
}

export type DefaultFn<K, V> = (key: K) => V

/**
 * Mutable key/value map with `Option` lookups.
 *
 * Keys are compared the way the native `Map` compares them. Iteration yields
 * `[key, value]` pairs in insertion order.
 */
export interface OptMap<K, V> extends Iterable<Tuple2<K, V>> {
    readonly size: number
    readonly isEmpty: boolean

    /** `Some(value)` if the key is stored (or defaulted), otherwise `None`. Never throws on a miss. */
    get(key: K): Option<V>
    /** Unwrapped lookup. Throws `KeyNotFoundError` on a plain miss. */
    at(key: K): V
    set(key: K, value: V): void
    /** Only keys actually stored count, never defaulted ones. */
    containsKey(key: K): boolean
    put(entry: Tuple2<K, V>): void

    /** Stored value, or `orElse` evaluated. Does not write. */
    getOrElse(key: K, orElse: OrElse<V>): V
    /** Stored value, or `orElse` evaluated once, stored under `key` and returned. */
    getOrElseUpdate(key: K, orElse: OrElse<V>): V

    /** New plain map with every key passed through `f`. Colliding keys: last one wins. */
    mapKeys<K2>(f: (key: K) => K2): OptMap<K2, V>
    mapValues<V2>(f: (value: V) => V2): OptMap<K, V2>

    /** Same stored pairs in both maps. Default functions are ignored. */
    sameContent(other: OptMap<K, V>, equals?: Equality<V>): boolean
    equals(other: OptMap<K, V>): boolean

    toMap(): Map<K, V>
    keys(): IterableIterator<K>
    values(): IterableIterator<V>
    forEach(f: (value: V, key: K) => void): void

    /** Wraps this map; the receiver is adopted, not copied. */
    defaulting(defaultFn: DefaultFn<K, V>): OptMap<K, V>
}

function formatMap<K, V>(name: string, map: OptMap<K, V>): string {
    let pairs = Array.from(map, ([key, value]) => `${String(key)}: ${String(value)}`)
    return `${name}(${pairs.join(", ")})`
}

export class BaseMap<K, V> implements OptMap<K, V> {
    private readonly entries: Map<K, Tuple2<K, V>> = new Map()

    get size(): number {
        return this.entries.size
    }

    get isEmpty(): boolean {
        return this.entries.size === 0
    }

    get(key: K): Option<V> {
        let entry = this.entries.get(key)
        return entry === undefined ? None : new Some(entry[1])
    }

    at(key: K): V {
        let entry = this.entries.get(key)
        if (entry === undefined) {
            throw new KeyNotFoundError(key)
        }
        return entry[1]
    }

    set(key: K, value: V): void {
        this.entries.set(key, tuple(key, value))
    }

    containsKey(key: K): boolean {
        return this.entries.has(key)
    }

    put(entry: Tuple2<K, V>): void {
        this.entries.set(entry[0], tuple(entry[0], entry[1]))
    }

    getOrElse(key: K, orElse: OrElse<V>): V {
        return this.get(key).getOrElse(orElse)
    }

    getOrElseUpdate(key: K, orElse: OrElse<V>): V {
        return this.get(key).getOrElse(() => {
            let value = evaluate(orElse)
            this.set(key, value)
            return value
        })
    }

    mapKeys<K2>(f: (key: K) => K2): OptMap<K2, V> {
        let result = new BaseMap<K2, V>()
        for (let [key, value] of this) {
            result.set(f(key), value)
        }
        return result
    }

    mapValues<V2>(f: (value: V) => V2): OptMap<K, V2> {
        let result = new BaseMap<K, V2>()
        for (let [key, value] of this) {
            result.set(key, f(value))
        }
        return result
    }

    sameContent(other: OptMap<K, V>, equals: Equality<V> = sameValueZero): boolean {
        if (this.size !== other.size) {
            return false
        }
        for (let [key, value] of this) {
            if (!other.containsKey(key) || !other.get(key).equals(new Some(value), equals)) {
                return false
            }
        }
        return true
    }

    equals(other: OptMap<K, V>): boolean {
        return other instanceof BaseMap && this.sameContent(other)
    }

    toMap(): Map<K, V> {
        let result = new Map<K, V>()
        for (let [key, value] of this) {
            result.set(key, value)
        }
        return result
    }

    keys(): IterableIterator<K> {
        return this.entries.keys()
    }

    *values(): IterableIterator<V> {
        for (let [, value] of this) {
            yield value
        }
    }

    forEach(f: (value: V, key: K) => void): void {
        for (let [key, value] of this) {
            f(value, key)
        }
    }

    defaulting(defaultFn: DefaultFn<K, V>): OptMap<K, V> {
        return new DefaultingMap(defaultFn, this)
    }

    [Symbol.iterator](): Iterator<Tuple2<K, V>> {
        return this.entries.values()
    }

    toString(): string {
        return formatMap("BaseMap", this)
    }
}

/**
 * Answers lookup misses with `defaultFn(key)` without storing the result.
 * Everything else goes to the inner map.
 */
export class DefaultingMap<K, V> implements OptMap<K, V> {
    constructor(
        private readonly defaultFn: DefaultFn<K, V>,
        private readonly inner: OptMap<K, V> = new BaseMap<K, V>(),
    ) { }

    get size(): number {
        return this.inner.size
    }

    get isEmpty(): boolean {
        return this.inner.isEmpty
    }

    // a stacked inner DefaultingMap always answers, so the innermost default wins
    get(key: K): Option<V> {
        return this.inner.get(key).orElse(() => new Some(this.defaultFn(key)))
    }

    at(key: K): V {
        return this.get(key).unwrap()
    }

    set(key: K, value: V): void {
        this.inner.set(key, value)
    }

    containsKey(key: K): boolean {
        return this.inner.containsKey(key)
    }

    put(entry: Tuple2<K, V>): void {
        this.inner.put(entry)
    }

    getOrElse(key: K, orElse: OrElse<V>): V {
        return this.inner.getOrElse(key, orElse)
    }

    getOrElseUpdate(key: K, orElse: OrElse<V>): V {
        return this.inner.getOrElseUpdate(key, orElse)
    }

    mapKeys<K2>(f: (key: K) => K2): OptMap<K2, V> {
        return this.inner.mapKeys(f)
    }

    mapValues<V2>(f: (value: V) => V2): OptMap<K, V2> {
        return this.inner.mapValues(f)
    }

    sameContent(other: OptMap<K, V>, equals?: Equality<V>): boolean {
        return this.inner.sameContent(other, equals)
    }

    equals(other: OptMap<K, V>): boolean {
        return other instanceof DefaultingMap && this.inner.equals(other.inner)
    }

    toMap(): Map<K, V> {
        return this.inner.toMap()
    }

    keys(): IterableIterator<K> {
        return this.inner.keys()
    }

    values(): IterableIterator<V> {
        return this.inner.values()
    }

    forEach(f: (value: V, key: K) => void): void {
        this.inner.forEach(f)
    }

    defaulting(defaultFn: DefaultFn<K, V>): OptMap<K, V> {
        return new DefaultingMap(defaultFn, this)
    }

    [Symbol.iterator](): Iterator<Tuple2<K, V>> {
        return this.inner[Symbol.iterator]()
    }

    toString(): string {
        return formatMap("DefaultingMap", this)
    }
}

export function emptyMap<K, V>(): OptMap<K, V> {
    return new BaseMap<K, V>()
}

export function fromEntries<K, V>(entries: Iterable<Tuple2<K, V>>): OptMap<K, V> {
    let result = new BaseMap<K, V>()
    for (let entry of entries) {
        result.put(entry)
    }
    return result
}

export function fromNativeMap<K, V>(map: ReadonlyMap<K, V>): OptMap<K, V> {
    let result = new BaseMap<K, V>()
    map.forEach((value, key) => result.set(key, value))
    return result
}

export function withDefault<K, V>(defaultFn: DefaultFn<K, V>): OptMap<K, V> {
    return new DefaultingMap(defaultFn)
}
