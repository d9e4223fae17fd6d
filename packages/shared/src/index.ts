// ============================================
// querymemo Shared Types
// ============================================

// Error codes
export { ErrorCode } from "./errors/index.js";
export type { Result } from "./types/result.js";
// Result type (shared so every package reports failure the same way)
export { Err, Ok, tryCatchAsync } from "./types/result.js";
