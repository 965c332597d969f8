export {
    OptMap, DefaultFn, BaseMap, DefaultingMap, KeyNotFoundError,
    emptyMap, fromEntries, fromNativeMap, withDefault,
} from './map'
export { Option, Some, None, some, optionOf, NoSuchElementError, Equality, sameValueZero } from '../../shared/option'
export { Evaluatable, Constant, Deferred, OrElse, constant, deferred, evaluate } from '../../shared/evaluatable'
export { Tuple2, tuple } from '../../shared/tuple'
