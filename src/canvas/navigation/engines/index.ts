/**
 * Navigation Engine Implementations
 */

export * from "./fractalNavigationEngine";
