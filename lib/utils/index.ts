/**
 * Small standalone helpers, re-exported for convenient imports.
 */

export { truncate, toStandardisedPath, toResolutionString, type Size } from "./string"

export { getOrDefault } from "./map"
