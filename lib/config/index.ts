export { ConfigService, getGlobalConfigService, resetGlobalConfigService } from "./service"
export { CONFIG_FILE_NAME, DEFAULT_CONFIG } from "./defaults"
export { loadConfigFromFile, loadConfigFromDir, validateConfig } from "./loader"
export { createLogger, digestOptionsFromConfig } from "./runtime"
export {
    ExtensionKitConfigSchema,
    DigestSettingsSchema,
    type ExtensionKitConfig,
    type DigestSettings,
} from "./schema"
