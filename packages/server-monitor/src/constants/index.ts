/**
 * Constants Module
 *
 * Re-exports all constants for deployment monitoring including
 * timeouts and default paths.
 */

export * from "./timeouts";
export * from "./defaults";
