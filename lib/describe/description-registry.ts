/**
 * Human-readable descriptions for enum values, kept in an explicit registry
 * filled by `register` calls rather than looked up from decorators or metadata.
 */

export type EnumLike = Record<string, string | number>

/**
 * Member values of an enum object. Numeric enums also carry a reverse
 * name lookup under number keys, which is left out here.
 */
export type EnumValue<E extends EnumLike> = E[Extract<keyof E, string>]

/**
 * Localisation hook consulted before registered descriptions.
 * Returning `undefined` defers to the registry.
 */
export type DescriptionMapper<T> = (value: T) => string | undefined

export class DescriptionRegistry<T extends string | number> {
    private readonly names = new Map<string | number, string>()
    private readonly descriptions = new Map<string | number, string>()

    private constructor(private readonly mapper?: DescriptionMapper<T>) {}

    /**
     * Creates a registry for an enum. Until descriptions are registered,
     * values describe themselves by their member name.
     */
    static forEnum<E extends EnumLike>(
        enumObject: E,
        mapper?: DescriptionMapper<EnumValue<E>>,
    ): DescriptionRegistry<EnumValue<E>> {
        const registry = new DescriptionRegistry<EnumValue<E>>(mapper)
        for (const key of Object.keys(enumObject)) {
            // reverse mapping entries of numeric enums
            if (!Number.isNaN(Number(key))) continue
            registry.names.set(enumObject[key], key)
        }
        return registry
    }

    register(value: T, description: string): this {
        this.descriptions.set(value, description)
        return this
    }

    /**
     * Resolves, in order: the mapper's result, the registered description,
     * the enum member name, and finally the value itself.
     */
    describe(value: T): string {
        const mapped = this.mapper?.(value)
        if (mapped !== undefined) return mapped

        return this.descriptions.get(value) ?? this.names.get(value) ?? String(value)
    }
}
