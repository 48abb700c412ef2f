import type { SourceAdapter } from "../../core";

export const XPOSED_STABLE_SOURCE_ID = "xposed_stable";

const STABLE_RELEASE_FIELD_MARKUP =
  '</div></div></div><div class="field field-name-field-release-type field-type-list-text field-label-inline clearfix">' +
  '<div class="field-label">Release type:&nbsp;</div><div class="field-items"><div class="field-item even">Stable';

export const xposedAdapter: SourceAdapter = {
  descriptor: {
    id: XPOSED_STABLE_SOURCE_ID,
    name: "Xposed Module Repository (stable)",
    urlTemplate: "http://repo.xposed.info/module/%s",
  },
  versionPattern: new RegExp(`>([^<]+?)${STABLE_RELEASE_FIELD_MARKUP}`),
};
