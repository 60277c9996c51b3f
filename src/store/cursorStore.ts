/**
 * Cursor Store - Latest cursor state for whoever renders it.
 *
 * Written once per accepted sample by the SampleDriver. Rejected samples only
 * bump a counter so a renderer keeps drawing the last good position.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import type {
    CursorPoint,
    Orientation,
    SampleResult,
} from '../lib/motion/types';

export interface CursorState {
    x: number;
    y: number;
    /** Oldest-first */
    path: readonly CursorPoint[];
    orientation: Orientation | null;
    acceptedSamples: number;
    rejectedSamples: number;

    // Actions
    publish: (result: SampleResult) => void;
    reset: () => void;
}

export type CursorStore = StoreApi<CursorState>;

const initialCursorState = {
    x: 0,
    y: 0,
    path: [],
    orientation: null,
    acceptedSamples: 0,
    rejectedSamples: 0,
} satisfies Omit<CursorState, 'publish' | 'reset'>;

export function createCursorStore(): CursorStore {
    return createStore<CursorState>()((set) => ({
        ...initialCursorState,

        publish: (result) => {
            if (!result.accepted) {
                set((state) => ({ rejectedSamples: state.rejectedSamples + 1 }));
                return;
            }
            set((state) => ({
                x: result.cursor.x,
                y: result.cursor.y,
                path: result.cursor.path,
                orientation: result.orientation,
                acceptedSamples: state.acceptedSamples + 1,
            }));
        },

        reset: () => set({ ...initialCursorState }),
    }));
}
