/**
 * Persistence Module
 *
 * Document encoding, storage backends and debounced autosave.
 */

export * from "./serialization";
export * from "./storage";
export * from "./CanvasAutosave";
