export { clamp, clamp01 } from "./math";
export { clampSetting } from "./validation";
export type { ClampSettingOptions } from "./validation";
