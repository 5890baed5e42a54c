/**
 * @deskrelay/shared - Shared types, schemas, and constants
 */

// Export all types and their schemas
export * from "./types/index.js";

// Export constants
export * from "./constants.js";
