import type { Logger } from "../logger"
import { DEFAULT_CONFIG } from "./defaults"
import { loadConfigFromDir } from "./loader"
import type { ExtensionKitConfig } from "./schema"

/**
 * Configuration Service with explicit lifecycle management.
 *
 * Usage:
 * ```typescript
 * const configService = new ConfigService()
 * configService.load(workspaceRoot)
 * const config = configService.get()
 * ```
 */
export class ConfigService {
    private config: ExtensionKitConfig | null = null
    private workspaceRoot: string | null = null

    constructor(private readonly logger?: Logger) {}

    /**
     * Load configuration from workspace directory, merged over defaults.
     */
    load(workspaceRoot: string): ExtensionKitConfig {
        this.workspaceRoot = workspaceRoot
        this.config = loadConfigFromDir(workspaceRoot, this.logger)
        return this.config
    }

    /**
     * Get current configuration.
     * Throws if load() hasn't been called.
     */
    get(): ExtensionKitConfig {
        if (!this.config) {
            throw new Error("ConfigService: Configuration not loaded. Call load() first.")
        }
        return this.config
    }

    /**
     * Get configuration or return defaults if not loaded.
     */
    getOrDefault(): ExtensionKitConfig {
        return this.config ?? DEFAULT_CONFIG
    }

    isLoaded(): boolean {
        return this.config !== null
    }

    /**
     * Reload configuration from disk.
     */
    reload(): ExtensionKitConfig {
        if (!this.workspaceRoot) {
            throw new Error("ConfigService: Cannot reload - workspace root not set")
        }
        return this.load(this.workspaceRoot)
    }

    /**
     * Reset to unloaded state.
     */
    reset(): void {
        this.config = null
        this.workspaceRoot = null
    }
}

let globalConfigService: ConfigService | null = null

/**
 * Get or create global config service instance.
 * Prefer passing a ConfigService around; this is for simple scripts.
 */
export function getGlobalConfigService(): ConfigService {
    if (!globalConfigService) {
        globalConfigService = new ConfigService()
    }
    return globalConfigService
}

export function resetGlobalConfigService(): void {
    globalConfigService = null
}
