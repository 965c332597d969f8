import { describe, expect, test, jest } from '@jest/globals';
import { BaseMap, DefaultingMap, emptyMap, fromEntries, withDefault } from './index';
import { None, some } from '../../shared/option';
import { tuple } from '../../shared/tuple';

describe('DefaultingMap', () => {
    test('default_not_stored', () => {
        let map = withDefault((key: string) => key.length)
        expect(map.get("hello").equals(some(5))).toBe(true)
        expect(map.containsKey("hello")).toBe(false)
        map.set("hello", 99)
        expect(map.get("hello").equals(some(99))).toBe(true)
        expect(map.containsKey("hello")).toBe(true)
    })

    test('at_uses_default', () => {
        let map = withDefault((key: string) => key + "!")
        expect(map.at("hi")).toBe("hi!")
        expect(map.size).toBe(0)
    })

    test('default_called_per_miss', () => {
        let makeDefault = jest.fn((key: string) => [key])
        let map = withDefault(makeDefault)
        let first = map.at("a")
        let second = map.at("a")
        expect(first).toEqual(["a"])
        expect(first).not.toBe(second)
        expect(makeDefault).toHaveBeenCalledTimes(2)
    })

    test('default_errors_propagate', () => {
        let map = withDefault<string, number>(key => { throw new RangeError(`no default for ${key}`) })
        expect(() => map.get("x")).toThrow("no default for x")
        expect(() => map.at("x")).toThrow(RangeError)
        map.set("x", 1)
        expect(map.at("x")).toBe(1)
    })

    test('getOrElse_ignores_default', () => {
        let makeDefault = jest.fn((key: string) => 0)
        let map = withDefault(makeDefault)
        expect(map.getOrElse("a", () => 7)).toBe(7)
        expect(map.containsKey("a")).toBe(false)
        expect(map.getOrElseUpdate("a", () => 8)).toBe(8)
        expect(map.getOrElseUpdate("a", () => 9)).toBe(8)
        expect(map.at("a")).toBe(8)
        expect(makeDefault).not.toHaveBeenCalled()
    })

    test('put_delegates', () => {
        let map = withDefault((key: string) => -1)
        map.put(tuple("k", 3))
        expect(map.containsKey("k")).toBe(true)
        expect(map.toMap()).toEqual(new Map([["k", 3]]))
        expect(Array.from(map)).toEqual([["k", 3]])
        expect(Array.from(map.keys())).toEqual(["k"])
        expect(Array.from(map.values())).toEqual([3])
    })

    test('mapKeys_mapValues_drop_default', () => {
        let map = withDefault((key: string) => 0)
        map.set("a", 1)
        let keys = map.mapKeys(key => key.toUpperCase())
        let values = map.mapValues(value => value * 2)
        expect(keys).toBeInstanceOf(BaseMap)
        expect(values).toBeInstanceOf(BaseMap)
        expect(keys.at("A")).toBe(1)
        expect(values.at("a")).toBe(2)
        expect(values.get("missing").equals(None)).toBe(true)
    })

    test('defaulting_adopts_receiver', () => {
        let base = emptyMap<string, number>()
        base.set("a", 1)
        let map = base.defaulting(() => 0)
        expect(map).toBeInstanceOf(DefaultingMap)
        expect(map.at("a")).toBe(1)
        expect(map.at("b")).toBe(0)
        map.set("c", 3)
        expect(base.at("c")).toBe(3)
        expect(() => base.at("b")).toThrow()
    })

    test('stacked_defaults_innermost_wins', () => {
        let outerDefault = jest.fn((key: string) => "outer")
        let inner = withDefault((key: string) => "inner")
        inner.set("stored", "value")
        let outer = inner.defaulting(outerDefault)
        expect(outer.at("x")).toBe("inner")
        expect(outer.get("x").equals(some("inner"))).toBe(true)
        expect(inner.at("x")).toBe("inner")
        expect(outer.at("stored")).toBe("value")
        expect(outerDefault).not.toHaveBeenCalled()
        outer.set("y", "set")
        expect(inner.at("y")).toBe("set")
        expect(outer.containsKey("x")).toBe(false)
    })

    test('sameContent_ignores_default', () => {
        let base = fromEntries([tuple("a", 1), tuple("b", 2)])
        let first = base.defaulting(() => 1)
        let second = base.defaulting(() => 2)
        expect(first.sameContent(second)).toBe(true)
        expect(second.sameContent(first)).toBe(true)
        expect(first.sameContent(base)).toBe(true)
        expect(base.sameContent(first)).toBe(true)
    })

    test('sameContent_uses_stored_values', () => {
        let plain = fromEntries([tuple("a", 1)])
        let defaulted = withDefault((key: string) => 1)
        expect(plain.sameContent(defaulted)).toBe(false)
        expect(defaulted.sameContent(plain)).toBe(false)
        defaulted.set("a", 1)
        expect(plain.sameContent(defaulted)).toBe(true)
    })

    test('equals', () => {
        let a = new DefaultingMap(() => 0, fromEntries([tuple("x", 1)]))
        let b = new DefaultingMap(() => 5, fromEntries([tuple("x", 1)]))
        let c = new DefaultingMap(() => 0, fromEntries([tuple("x", 2)]))
        expect(a.equals(b)).toBe(true)
        expect(a.equals(c)).toBe(false)
        expect(a.equals(fromEntries([tuple("x", 1)]))).toBe(false)
    })

    test('toString', () => {
        let map = withDefault((key: string) => 0)
        map.set("a", 1)
        expect(map.toString()).toBe("DefaultingMap(a: 1)")
        expect(map.isEmpty).toBe(false)
    })
})
