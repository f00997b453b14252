// ============================================
// @treescan/core
// ============================================

// Configuration
export * from "./config/index.js";
// Errors
export * from "./errors/index.js";
// Logging
export * from "./logger/index.js";
// Search engine
export * from "./search/index.js";
