import { createStore } from "zustand/vanilla";
import type {
  AppCheckResultMessage,
  AppCheckRunCurrentItem,
  AppCheckRunSnapshot,
  AppCheckRunStatus,
} from "./appCheck.types";

interface SetRunSnapshotInput {
  runId?: number | null;
  status?: AppCheckRunStatus;
  total?: number;
  processed?: number;
  updated?: number;
  upToDate?: number;
  errors?: number;
  networkErrors?: number;
  skipped?: number;
  startedAt?: number | null;
  endedAt?: number | null;
  current?: AppCheckRunCurrentItem | null;
  errorMessage?: string | null;
}

interface AppCheckStoreState {
  snapshot: AppCheckRunSnapshot;
  lastResult: AppCheckResultMessage | null;
  resultsByPackageId: Record<string, AppCheckResultMessage>;
  setRunSnapshot: (input: SetRunSnapshotInput) => void;
  publishResult: (result: AppCheckResultMessage) => void;
  resetAppCheckState: () => void;
}

const initialSnapshot: AppCheckRunSnapshot = {
  runId: null,
  status: "idle",
  total: 0,
  processed: 0,
  updated: 0,
  upToDate: 0,
  errors: 0,
  networkErrors: 0,
  skipped: 0,
  startedAt: null,
  endedAt: null,
  current: null,
  errorMessage: null,
};

export const appCheckStore = createStore<AppCheckStoreState>((set) => ({
  snapshot: initialSnapshot,
  lastResult: null,
  resultsByPackageId: {},

  setRunSnapshot: (input) => {
    set((state) => ({
      snapshot: {
        ...state.snapshot,
        ...input,
      },
    }));
  },

  publishResult: (result) => {
    set((state) => ({
      lastResult: result,
      resultsByPackageId: {
        ...state.resultsByPackageId,
        [result.packageId]: result,
      },
    }));
  },

  resetAppCheckState: () => {
    set({
      snapshot: initialSnapshot,
      lastResult: null,
      resultsByPackageId: {},
    });
  },
}));

export const getAppCheckRunSnapshot = (): AppCheckRunSnapshot =>
  appCheckStore.getState().snapshot;

export const getLastAppCheckResult = (packageId: string): AppCheckResultMessage | undefined =>
  appCheckStore.getState().resultsByPackageId[packageId];

export const subscribeToAppCheckResults = (
  listener: (result: AppCheckResultMessage) => void
): (() => void) =>
  appCheckStore.subscribe((state, previousState) => {
    if (state.lastResult && state.lastResult !== previousState.lastResult) {
      listener(state.lastResult);
    }
  });
