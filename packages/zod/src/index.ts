// Parsing
export { parse } from "./parse.js";

// Schemas
export { maybeSchema, trialSchema } from "./schemas.js";

// Formatting
export type { StructuredLogReasons } from "./format.js";
export {
  issueToString,
  reasonsToString,
  reasonsToStructuredLog,
} from "./format.js";
