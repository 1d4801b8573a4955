/**
 * Navigation arithmetic over (index, shift, cursorRow).
 *
 * `index` selects a slot, `shift` is the first visible slot and `cursorRow`
 * is the display row of the selection, so `index === shift + cursorRow`
 * holds for every state produced here.
 */

export type NavigationState = Readonly<{
    index: number;
    shift: number;
    cursorRow: number;
}>;

export const INITIAL_STATE: NavigationState = Object.freeze({ index: 0, shift: 0, cursorRow: 0 });

export function maxIndex(count: number): number | null {
    return count > 0 ? count - 1 : null;
}

export function maxShift(count: number, rows: number): number {
    return Math.max(0, count - rows);
}

/** -1 for an empty menu. */
export function maxCursorRow(count: number, rows: number): number {
    return Math.min(rows, count) - 1;
}

export function stepDown(state: NavigationState, count: number, rows: number): NavigationState {
    const last = maxIndex(count);
    if (last === null || state.index >= last) return state;
    const index = state.index + 1;
    if (index > state.shift + rows - 1) {
        return { index, shift: state.shift + 1, cursorRow: state.cursorRow };
    }
    return { index, shift: state.shift, cursorRow: Math.min(state.cursorRow + 1, maxCursorRow(count, rows)) };
}

export function stepUp(state: NavigationState, count: number, rows: number): NavigationState {
    if (count === 0 || state.index <= 0) return state;
    const index = state.index - 1;
    if (index < state.shift) {
        return { index, shift: state.shift - 1, cursorRow: state.cursorRow };
    }
    return { index, shift: state.shift, cursorRow: Math.max(state.cursorRow - 1, 0) };
}

/** Pulls a state back into range after the slot count changed, keeping the index when it is still valid. */
export function clampState(state: NavigationState, count: number, rows: number): NavigationState {
    const last = maxIndex(count);
    if (last === null) return INITIAL_STATE;
    const index = Math.min(Math.max(state.index, 0), last);
    let shift = Math.min(Math.max(state.shift, 0), maxShift(count, rows));
    if (index < shift) {
        shift = index;
    } else if (index > shift + rows - 1) {
        shift = index - rows + 1;
    }
    return { index, shift, cursorRow: index - shift };
}

/** Moves the cursor to the top row without scrolling; the selection follows the cursor. */
export function cursorToTop(state: NavigationState): NavigationState {
    return { index: state.index - state.cursorRow, shift: state.shift, cursorRow: 0 };
}
