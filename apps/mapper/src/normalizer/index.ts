export { normalizeName } from './name-normalizer'
export { decomposeLabel, type DecomposedLabel } from './label-decomposer'
export { mapSize, mapTemperature, SIZE_OUNCES, TEMPERATURE_NAMES } from './dimensions'
