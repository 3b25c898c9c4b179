export {
    naturalOrder,
    binarySearch,
    insertSorted,
    type Comparator,
    type Comparable,
    type SearchResult,
} from "./sorted-insert"
