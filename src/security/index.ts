export { sanitizeContent } from "./sanitize.js";
export type { SanitizeResult } from "./sanitize.js";
export { validateAnnotation, validateField } from "./validate.js";
export type { FieldRule, ValidationResult } from "./validate.js";
export { verifyUrl } from "./verifyUrl.js";
export type { SourceDomains } from "./verifyUrl.js";
export { INJECTION_RULES, REDACTION_TOKEN } from "./patterns.js";
