/**
 * @tidybits/functional - Small helpers for objects, maps, enums, errors and strings
 */

// re-export everything for full access
export * from "./container-utils.mjs";
export * from "./enum-utils.mjs";
export * from "./errors.mjs";
export * from "./exception-utils.mjs";
export * from "./object-utils.mjs";
export * from "./option.mjs";
export * from "./singleton-reducers.mjs";
export * from "./string-utils.mjs";
