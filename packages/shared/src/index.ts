// ============================================
// Taskline Shared Types
// ============================================

// Error codes
export { ErrorCode } from "./errors/index.js";
export {
  asciiIcons,
  detectIconSupport,
  getIconSet,
  type IconPreference,
  type IconSet,
  type IconSupport,
  unicodeIcons,
} from "./theme/icons.js";
export type { ErrResult, OkResult, Result } from "./types/result.js";
export { Err, Ok } from "./types/result.js";
