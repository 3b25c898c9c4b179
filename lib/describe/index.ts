export {
    DescriptionRegistry,
    type DescriptionMapper,
    type EnumLike,
    type EnumValue,
} from "./description-registry"
