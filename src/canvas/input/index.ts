/**
 * Input Module
 *
 * Interprets normalized UI events as anchor-stable navigation gestures.
 */

export * from "./types";
export * from "./InteractionController";
