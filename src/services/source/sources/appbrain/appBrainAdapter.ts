import type { SourceAdapter } from "../../core";

export const APPBRAIN_SOURCE_ID = "appbrain";

// AppBrain serves a placeholder page instead of a 404 for delisted apps.
const DELISTED_MARKERS = [
  "This app is unfortunately no longer available on the Android market.",
  "Oops! This page does not exist anymore...",
];

export const appBrainAdapter: SourceAdapter = {
  descriptor: {
    id: APPBRAIN_SOURCE_ID,
    name: "AppBrain",
    urlTemplate: "https://www.appbrain.com/app/google/%s",
    headers: {
      Cookie: "agentok=1",
    },
  },
  versionPattern: /<div class="clDesc">Version ([^<]+?)<\/div>/,
  unavailablePattern: new RegExp(DELISTED_MARKERS.join("|")),
};
