import { describe, it, expect } from "vitest"
import { DescriptionRegistry } from "../../lib/describe"

enum Direction {
    Up,
    Down,
    Left,
}

enum Colour {
    Red = "red",
    Blue = "blue",
}

describe("DescriptionRegistry", () => {
    it("falls back to the member name of a numeric enum", () => {
        const registry = DescriptionRegistry.forEnum(Direction)

        expect(registry.describe(Direction.Up)).toBe("Up")
        expect(registry.describe(Direction.Left)).toBe("Left")
    })

    it("falls back to the member name of a string enum", () => {
        const registry = DescriptionRegistry.forEnum(Colour)
        expect(registry.describe(Colour.Blue)).toBe("Blue")
    })

    it("prefers a registered description", () => {
        const registry = DescriptionRegistry.forEnum(Direction)
            .register(Direction.Up, "Upwards")
            .register(Direction.Down, "Downwards")

        expect(registry.describe(Direction.Up)).toBe("Upwards")
        expect(registry.describe(Direction.Down)).toBe("Downwards")
        expect(registry.describe(Direction.Left)).toBe("Left")
    })

    it("replaces a description registered twice", () => {
        const registry = DescriptionRegistry.forEnum(Colour)
            .register(Colour.Red, "Crimson")
            .register(Colour.Red, "Scarlet")

        expect(registry.describe(Colour.Red)).toBe("Scarlet")
    })

    it("consults the mapper first and defers when it returns undefined", () => {
        const registry = DescriptionRegistry.forEnum(Direction, (value) =>
            value === Direction.Left ? "Gauche" : undefined,
        ).register(Direction.Left, "To the left")

        expect(registry.describe(Direction.Left)).toBe("Gauche")
        expect(registry.describe(Direction.Down)).toBe("Down")
    })

    it("describes an unknown value by itself", () => {
        const levels: Record<string, number> = { Low: 1, High: 2 }
        const registry = DescriptionRegistry.forEnum(levels)

        expect(registry.describe(2)).toBe("High")
        expect(registry.describe(99)).toBe("99")
    })
})
