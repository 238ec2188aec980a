// Short ID generation and validation
export {
  generateShortId,
  validateShortId,
  isBlank,
  type RandomIntSource,
  type ShortIdRule,
  type ValidationResult,
} from "./shortid.js";

// URL helpers
export { buildShortUrl, isHttpUrl } from "./url.js";
