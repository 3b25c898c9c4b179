import { RectangularMatrix } from "./rectangular-matrix"

/**
 * Conversions between fixed-size and per-row-variable grid layouts.
 *
 * All functions are pure and pass an absent (null or undefined) input
 * through as `undefined`.
 */

export type JaggedMatrix<T> = T[][]

/**
 * Jagged input may contain missing rows, which are read as empty.
 */
export type JaggedInput<T> = readonly (readonly T[] | null | undefined)[]

export type Absent = null | undefined

/**
 * Copies each row of a rectangular matrix into its own array.
 * A matrix without columns yields one empty array per row.
 */
export function toJagged<T>(matrix: RectangularMatrix<T>): JaggedMatrix<T>
export function toJagged<T>(matrix: RectangularMatrix<T> | Absent): JaggedMatrix<T> | undefined
export function toJagged<T>(matrix: RectangularMatrix<T> | Absent): JaggedMatrix<T> | undefined {
    if (matrix === null || matrix === undefined) return undefined
    return matrix.toArray()
}

/**
 * Pads a jagged matrix out to the width of its widest row.
 * Cells past the end of a short or missing row take `defaultValue`.
 */
export function toRectangular<T>(jagged: JaggedInput<T>, defaultValue: T): RectangularMatrix<T>
export function toRectangular<T>(
    jagged: JaggedInput<T> | Absent,
    defaultValue: T,
): RectangularMatrix<T> | undefined
export function toRectangular<T>(
    jagged: JaggedInput<T> | Absent,
    defaultValue: T,
): RectangularMatrix<T> | undefined {
    if (jagged === null || jagged === undefined) return undefined

    const rows = jagged.length
    let cols = 0
    for (let r = 0; r < rows; r++) {
        cols = Math.max(cols, jagged[r]?.length ?? 0)
    }

    return RectangularMatrix.generate(rows, cols, (r, c) => {
        const row = jagged[r]
        if (!row || c >= row.length) return defaultValue
        return row[c]
    })
}

/**
 * Swaps rows and columns: a rows x cols input becomes cols x rows.
 */
export function transpose<T>(matrix: RectangularMatrix<T>): RectangularMatrix<T>
export function transpose<T>(
    matrix: RectangularMatrix<T> | Absent,
): RectangularMatrix<T> | undefined
export function transpose<T>(
    matrix: RectangularMatrix<T> | Absent,
): RectangularMatrix<T> | undefined {
    if (matrix === null || matrix === undefined) return undefined
    return RectangularMatrix.generate(matrix.cols, matrix.rows, (r, c) => matrix.get(c, r))
}

/**
 * Transposes a jagged matrix by way of its rectangular form.
 *
 * The result is always padded: every output row has one cell per input row,
 * with `defaultValue` wherever the input row was too short or missing.
 */
export function transposeJagged<T>(jagged: JaggedInput<T>, defaultValue: T): JaggedMatrix<T>
export function transposeJagged<T>(
    jagged: JaggedInput<T> | Absent,
    defaultValue: T,
): JaggedMatrix<T> | undefined
export function transposeJagged<T>(
    jagged: JaggedInput<T> | Absent,
    defaultValue: T,
): JaggedMatrix<T> | undefined {
    return toJagged(transpose(toRectangular(jagged, defaultValue)))
}
