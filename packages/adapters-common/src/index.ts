// Interfaces
export * from "./interfaces";

// Types
export * from "./types";

// Utilities
export * from "./utils";
