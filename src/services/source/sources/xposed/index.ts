export { XPOSED_STABLE_SOURCE_ID, xposedAdapter } from "./xposedAdapter";
