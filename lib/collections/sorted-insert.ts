/**
 * Sorted list insertion.
 *
 * Binary search locates the insertion point, so callers must only use these
 * on lists already sorted under the same comparator. That is not checked.
 */

export type Comparator<T> = (a: T, b: T) => number

/**
 * Types with a built-in total order usable by {@link naturalOrder}.
 */
export type Comparable = number | string | bigint | Date

/**
 * Outcome of a binary search: either an equal element was found,
 * or the index where the value would have to go to keep the list sorted.
 */
export type SearchResult = { found: true; index: number } | { found: false; insertionPoint: number }

export function naturalOrder<T extends Comparable>(a: T, b: T): number {
    if (a < b) return -1
    if (a > b) return 1
    return 0
}

/**
 * Binary search over a sorted list.
 *
 * When several elements compare equal to `value`, the index of whichever one
 * the search probes first is returned, not necessarily the first of the run.
 */
export function binarySearch<T>(
    list: readonly T[],
    value: T,
    compare: Comparator<T>,
): SearchResult {
    let low = 0
    let high = list.length - 1

    while (low <= high) {
        const mid = low + ((high - low) >> 1)
        const order = compare(list[mid], value)

        if (order === 0) {
            return { found: true, index: mid }
        }
        if (order < 0) {
            low = mid + 1
        } else {
            high = mid - 1
        }
    }

    return { found: false, insertionPoint: low }
}

/**
 * Inserts `value` into a sorted list in place and returns the index it was placed at.
 * Duplicates go before the equal element the search landed on.
 */
export function insertSorted<T extends Comparable>(list: T[], value: T): number
export function insertSorted<T>(list: T[], value: T, compare: Comparator<T>): number
export function insertSorted<T>(list: T[], value: T, compare?: Comparator<T>): number {
    const result = compare ? binarySearch(list, value, compare) : searchNatural(list, value)
    const index = result.found ? result.index : result.insertionPoint

    list.splice(index, 0, value)
    return index
}

// Natural ordering is only reachable through the Comparable overload
function searchNatural<T>(list: readonly T[], value: T): SearchResult {
    return binarySearch<unknown>(list, value, compareUnknown)
}

function compareUnknown(a: unknown, b: unknown): number {
    if (isComparable(a) && isComparable(b)) {
        return naturalOrder<Comparable>(a, b)
    }
    throw new TypeError(`Values are not naturally comparable: ${String(a)}, ${String(b)}`)
}

function isComparable(value: unknown): value is Comparable {
    return (
        typeof value === "number" ||
        typeof value === "string" ||
        typeof value === "bigint" ||
        value instanceof Date
    )
}
