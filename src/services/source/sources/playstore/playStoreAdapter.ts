import type { SourceAdapter } from "../../core";

export const PLAY_STORE_SOURCE_ID = "play_store";

export const playStoreAdapter: SourceAdapter = {
  descriptor: {
    id: PLAY_STORE_SOURCE_ID,
    name: "Google Play Store",
    urlTemplate: "https://play.google.com/store/apps/details?id=%s",
  },
  versionPattern: /itemprop="softwareVersion">([^<]+?)<\/div>/,
};
