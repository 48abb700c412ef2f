import type { VersionClassification } from "./appCheck.types";

// Any character but a space, or a space that opens a parenthesised suffix:
// "1.2 (beta)" passes, "Varies with device" does not.
const VERSION_TOKEN_PATTERN = /^([^ ]| \()*$/;

export const isVersionToken = (candidate: string): boolean =>
  VERSION_TOKEN_PATTERN.test(candidate);

export const classifyCandidate = (
  candidate: string,
  installedVersion: string | null
): VersionClassification => {
  if (!isVersionToken(candidate)) {
    return { kind: "not_a_version", candidate };
  }

  return {
    kind: "valid",
    version: candidate,
    // An unknown installed version is never an update, as in isUpdateAvailable.
    isUpdate: installedVersion !== null && candidate !== installedVersion,
  };
};
