/**
 * Fixed-size two-dimensional grid stored row-major.
 *
 * Every cell always holds a value: cells that were never set keep the fill
 * value given at construction, which stands in for the element type's default.
 */
export class RectangularMatrix<T> {
    private constructor(
        readonly rows: number,
        readonly cols: number,
        private readonly cells: T[],
    ) {}

    static filled<T>(rows: number, cols: number, fill: T): RectangularMatrix<T> {
        assertDimension("rows", rows)
        assertDimension("cols", cols)
        return new RectangularMatrix(rows, cols, new Array<T>(rows * cols).fill(fill))
    }

    static generate<T>(
        rows: number,
        cols: number,
        cell: (row: number, col: number) => T,
    ): RectangularMatrix<T> {
        assertDimension("rows", rows)
        assertDimension("cols", cols)
        const cells: T[] = []
        for (let r = 0; r < rows; r++) {
            for (let c = 0; c < cols; c++) {
                cells.push(cell(r, c))
            }
        }
        return new RectangularMatrix(rows, cols, cells)
    }

    /**
     * Builds a matrix from rows of equal length.
     * Throws a RangeError when the rows are ragged; use toRectangular for those.
     */
    static fromRows<T>(rows: readonly (readonly T[])[]): RectangularMatrix<T> {
        const cols = rows[0]?.length ?? 0
        const cells: T[] = []

        for (let r = 0; r < rows.length; r++) {
            const row: readonly T[] | undefined = rows[r]
            if (row === undefined) {
                throw new RangeError(`Row ${r} is missing`)
            }
            if (row.length !== cols) {
                throw new RangeError(`Row ${r} has ${row.length} cells, expected ${cols}`)
            }
            cells.push(...row)
        }
        return new RectangularMatrix(rows.length, cols, cells)
    }

    get(row: number, col: number): T {
        return this.cells[this.offset(row, col)]
    }

    set(row: number, col: number, value: T): void {
        this.cells[this.offset(row, col)] = value
    }

    row(row: number): T[] {
        assertIndex("Row", row, this.rows)
        const start = row * this.cols
        return this.cells.slice(start, start + this.cols)
    }

    toArray(): T[][] {
        const result: T[][] = []
        for (let r = 0; r < this.rows; r++) {
            result.push(this.row(r))
        }
        return result
    }

    private offset(row: number, col: number): number {
        assertIndex("Row", row, this.rows)
        assertIndex("Column", col, this.cols)
        return row * this.cols + col
    }
}

function assertDimension(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
        throw new RangeError(`Invalid matrix ${name}: ${value}`)
    }
}

function assertIndex(name: string, index: number, length: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
        throw new RangeError(`${name} ${index} out of range [0, ${length})`)
    }
}
