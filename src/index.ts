export * from "./common/vector/utils";
export * from "./common/errors";
export * from "./fractal";
export * from "./canvas";
export * from "./stores/canvasStore";
export * from "./commander";
export { navTrace, setNavTraceEnabled } from "./utils/navTrace";
export type { NavTraceScope } from "./utils/navTrace";
