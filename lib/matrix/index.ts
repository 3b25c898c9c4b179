export { RectangularMatrix } from "./rectangular-matrix"
export {
    toJagged,
    toRectangular,
    transpose,
    transposeJagged,
    type JaggedMatrix,
    type JaggedInput,
    type Absent,
} from "./layout"
