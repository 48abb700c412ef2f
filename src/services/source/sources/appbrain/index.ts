export { APPBRAIN_SOURCE_ID, appBrainAdapter } from "./appBrainAdapter";
