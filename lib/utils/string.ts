/**
 * Small string helpers.
 */

/**
 * Truncates a string to maxLen characters, adding ellipsis if truncated.
 */
export function truncate(str: string, maxLen: number = 60): string {
    if (str.length <= maxLen) return str
    return str.slice(0, maxLen - 3) + "..."
}

/**
 * Standardises a path to use '/' as the directory separator.
 */
export function toStandardisedPath(path: string): string {
    return path.replaceAll("\\", "/")
}

export interface Size {
    width: number
    height: number
}

/**
 * Formats a size as a resolution string, e.g. "1920x1080".
 */
export function toResolutionString(size: Size): string {
    return `${size.width}x${size.height}`
}
