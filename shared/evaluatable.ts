export abstract class Evaluatable<T> {
    abstract evaluate(): T
}

export class Constant<T> extends Evaluatable<T> {
    constructor(readonly value: T) {
        super()
    }

    evaluate(): T {
        return this.value
    }
}

// closure runs again on every evaluate(), nothing is cached
export class Deferred<T> extends Evaluatable<T> {
    constructor(private readonly compute: () => T) {
        super()
    }

    evaluate(): T {
        return this.compute()
    }
}

export type OrElse<T> = Evaluatable<T> | (() => T)

export function constant<T>(value: T): Constant<T> {
    return new Constant(value)
}

export function deferred<T>(compute: () => T): Deferred<T> {
    return new Deferred(compute)
}

export function evaluate<T>(orElse: OrElse<T>): T {
    if (orElse instanceof Evaluatable) {
        return orElse.evaluate()
    }
    return orElse()
}
