export { runMapping, type RunMappingOptions, type RunMappingResult } from './run-mapping'
export { runCatalogBuild, type RunCatalogBuildOptions, type RunCatalogBuildResult } from './run-catalog-build'
