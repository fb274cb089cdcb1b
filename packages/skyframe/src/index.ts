export * from "@skyframe/core";
export * from "@skyframe/angles";
export * from "@skyframe/time";
export * from "@skyframe/coords";
export * from "@skyframe/earth";
export * from "@skyframe/corrections";
export * from "@skyframe/binary-star";

export { SkyframeError, wrapSkyframeError } from "./errors.js";
export type { HorizontalPositionRequest, SiderealTimeOptions } from "./observe.js";
export { apparentSiderealTimeAt, horizontalPositionAt } from "./observe.js";
