export { SchemaValidationCache, formatAjvErrors, validateAgainstSchema } from "./schema_cache";
export { default as ReleaseConfigSchema } from "./relpack_config.schema.json";
