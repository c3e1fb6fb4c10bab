export {
  createPackage,
  needsDetail,
  PACKAGE_TYPES,
  type Package,
  type PackageType,
  type CleanupItem,
  type CleanupPreview,
} from "./package.js";
export {
  parseServiceStatus,
  isServiceRunning,
  type Service,
  type ServiceStatus,
} from "./service.js";
