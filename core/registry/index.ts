/**
 * Registry module - shared registration and lookup.
 */

export {
	BaseRegistry,
	RegistryNotFoundError,
	RegistryConflictError,
} from "./base-registry.ts";
