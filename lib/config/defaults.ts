import { DEFAULT_BUFFER_SIZE } from "../digest/digest"
import type { ExtensionKitConfig } from "./schema"

export const CONFIG_FILE_NAME = "extension-kit.jsonc"

export const DEFAULT_CONFIG: ExtensionKitConfig = {
    debug: false,
    logFormat: "text",
    digest: {
        bufferSize: DEFAULT_BUFFER_SIZE,
    },
}
