export { PLAY_STORE_SOURCE_ID, playStoreAdapter } from "./playStoreAdapter";
