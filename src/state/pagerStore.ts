import { createStore } from "zustand/vanilla";
import { createInitialPagerState, updatePager } from "./pagerUpdate.js";
import type { UpdateOptions } from "./pagerUpdate.js";
import type { PagerEffect, PagerEvent, PagerState } from "../types/app.js";

export interface PagerStore {
  pager: PagerState;
  apply: (event: PagerEvent) => PagerEffect[];
  reset: () => void;
}

export const createPagerStore = (options: UpdateOptions) =>
  createStore<PagerStore>()((set, get) => ({
    pager: createInitialPagerState(),
    apply: (event: PagerEvent) => {
      const { state, effects } = updatePager(get().pager, event, options);
      if (state !== get().pager) {
        set({ pager: state });
      }
      return effects;
    },
    reset: () =>
      set({
        pager: createInitialPagerState()
      })
  }));

export type PagerStoreApi = ReturnType<typeof createPagerStore>;
