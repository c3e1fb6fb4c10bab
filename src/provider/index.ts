/**
 * Package provider exports
 */

export type {
  PackageProvider,
  PackageAction,
  MaintenanceOp,
  ServiceAction,
  ProviderCallOptions,
} from "./types.js";
export { BrewProvider, type BrewProviderOptions } from "./brew.js";
export {
  parseVersionsList,
  parseNameList,
  parseSearchOutput,
  parseOutdatedJson,
  parseInfoJson,
  parseSize,
  parseCleanupOutput,
  parseServicesList,
} from "./parsers.js";
