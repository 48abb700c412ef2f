import type { AppCheckAttempt } from "./appCheck.types";

interface InflightCheck {
  manual: boolean;
  attempt: Promise<AppCheckAttempt>;
}

const isFatalErrorSkip = (attempt: AppCheckAttempt): boolean =>
  attempt.kind === "skipped" && attempt.reason === "fatal_error";

/**
 * At most one check per package at a time. A dispatch for a package that is
 * already being checked joins that check. A manual dispatch arriving during an
 * automatic check waits for it instead, and runs its own check when the automatic
 * one skipped the app for a previous fatal error.
 */
export class PackageCheckLock {
  private readonly inflightByPackage = new Map<string, InflightCheck>();

  run(
    packageId: string,
    manual: boolean,
    check: () => Promise<AppCheckAttempt>
  ): Promise<AppCheckAttempt> {
    const inflight = this.inflightByPackage.get(packageId);
    if (inflight && (inflight.manual || !manual)) {
      return inflight.attempt;
    }

    const started = inflight
      ? inflight.attempt.then((joined) => (isFatalErrorSkip(joined) ? check() : joined))
      : check();

    const attempt = started.finally(() => {
      if (this.inflightByPackage.get(packageId)?.attempt === attempt) {
        this.inflightByPackage.delete(packageId);
      }
    });

    this.inflightByPackage.set(packageId, { manual, attempt });
    return attempt;
  }

  isLocked(packageId: string): boolean {
    return this.inflightByPackage.has(packageId);
  }
}
