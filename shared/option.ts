import { OrElse, evaluate } from './evaluatable'

export class NoSuchElementError extends Error {
    constructor(message: string = "unwrap called on None") {
        super(message)
        this.name = "NoSuchElementError"
    }
}

export type Equality<T> = (a: T, b: T) => boolean

// same comparison Map uses for its keys
export function sameValueZero<T>(a: T, b: T): boolean {
    return a === b || (a !== a && b !== b)
}

/**
 * A value that is either present (`Some`) or absent (`None`).
 */
export abstract class Option<T> {
    abstract readonly isDefined: boolean

    get isEmpty(): boolean {
        return !this.isDefined
    }

    isSome(): this is Some<T> {
        return this.isDefined
    }

    /** Returns the value, throwing `NoSuchElementError` on `None`. */
    abstract unwrap(): T

    getOrElse(orElse: OrElse<T>): T {
        return this.isSome() ? this.value : evaluate(orElse)
    }

    orElse(alternative: () => Option<T>): Option<T> {
        return this.isSome() ? this : alternative()
    }

    map<U>(f: (value: T) => U): Option<U> {
        return this.isSome() ? new Some(f(this.value)) : None
    }

    flatMap<U>(f: (value: T) => Option<U>): Option<U> {
        return this.isSome() ? f(this.value) : None
    }

    filter(predicate: (value: T) => boolean): Option<T> {
        return this.isSome() && predicate(this.value) ? this : None
    }

    toNullable(): T | null {
        return this.isSome() ? this.value : null
    }

    equals(other: Option<T>, equals: Equality<T> = sameValueZero): boolean {
        if (this.isSome() && other.isSome()) {
            return equals(this.value, other.value)
        }
        return this.isEmpty && other.isEmpty
    }

    abstract toString(): string
}

export class Some<T> extends Option<T> {
    readonly isDefined = true

    constructor(readonly value: T) {
        super()
    }

    unwrap(): T {
        return this.value
    }

    toString(): string {
        return `Some(${String(this.value)})`
    }
}

class NoneOption extends Option<never> {
    readonly isDefined = false

    unwrap(): never {
        throw new NoSuchElementError()
    }

    toString(): string {
        return "None"
    }
}

export const None: Option<never> = new NoneOption()

export function some<T>(value: T): Option<T> {
    return new Some(value)
}

export function optionOf<T>(value: T | null | undefined): Option<T> {
    return value === null || value === undefined ? None : new Some(value)
}
