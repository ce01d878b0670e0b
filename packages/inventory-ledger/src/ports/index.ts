export { InMemoryAssetRegistry, type AssetRegistry, type RegistryResult } from "./assetRegistry.js";
export { RoleRegistry, type AuthorizationGate } from "./authorization.js";
