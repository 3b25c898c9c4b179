/**
 * Gets a value from a map, or a fallback when the key is missing.
 * A key that is present with an `undefined` value returns `undefined`, not the fallback.
 */
export function getOrDefault<K, V>(map: ReadonlyMap<K, V>, key: K): V | undefined
export function getOrDefault<K, V>(map: ReadonlyMap<K, V>, key: K, fallback: V): V
export function getOrDefault<K, V>(map: ReadonlyMap<K, V>, key: K, fallback?: V): V | undefined {
    return map.has(key) ? map.get(key) : fallback
}
