/**
 * Field of View Module
 */

export { fieldOfView } from "./field-of-view";
export { VisionMap, type VisionOptions } from "./vision-map";
