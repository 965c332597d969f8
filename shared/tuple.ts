export type Tuple2<A, B> = readonly [A, B]

export function tuple<A, B>(first: A, second: B): Tuple2<A, B> {
    return [first, second]
}
