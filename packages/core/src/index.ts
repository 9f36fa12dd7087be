export * as Adapters from "./adapters";
export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Factories from "./record_factories";
export * as Logger from "./logger";
export * as Schemas from "./record_schemas";
export * as Store from "./record_store";
export * as Validation from "./record_validations";
export * as Records from "./record_types";
export * as Errors from "./types";

// In-memory implementations
export * as Memory from "./memory";
