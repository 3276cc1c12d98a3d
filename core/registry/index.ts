/**
 * Registry module - name/alias registry shared by pluggable components.
 */

export {
	BaseRegistry,
	RegistryNotFoundError,
	RegistryConflictError,
	type Registrable,
	type RegistryOptions,
} from "./base-registry.ts";
