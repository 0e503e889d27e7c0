// Functions
export { identity, constant, constant2 } from "./functions.js";

// Errors
export type { NotFound } from "./errors.js";
export { NOT_FOUND, TaggedError, NotFoundError, isNotFoundError } from "./errors.js";

// Branding
export type { Brand, Branded } from "./marker.js";
export { createBrand } from "./marker.js";
