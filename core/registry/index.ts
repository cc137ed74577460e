/**
 * Registry module - shared name/alias registration for losses and frame adapters.
 */

export {
	BaseRegistry,
	RegistryNotFoundError,
	RegistryConflictError,
} from "./base-registry.ts";
