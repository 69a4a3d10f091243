/**
 * relaygen emitter - registration module generation
 */

export type { EmitterOptions, GeneratedUnit, ImportExtension } from "./types.js";
export {
  GENERATOR_NAME,
  GENERATOR_VERSION,
  UNIT_NAME,
  DEFAULT_OUTPUT_FILE,
  generateFileHeader,
  stripInformationalLines,
} from "./constants.js";
export { defaultOptions } from "./options.js";
export {
  type ModuleAlias,
  type ModuleAliasMap,
  buildModuleAliases,
  resolveImportSpecifier,
} from "./module-aliases.js";
export { emitQualifiedName, emitTypeReference } from "./type-emitter.js";
export { emitRegistrationUnit } from "./registration-emitter.js";
