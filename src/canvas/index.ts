export * from "./navigation";
export * from "./input";
export * from "./persistence";
export * from "./content/relocate";
export * from "./CanvasSession";
