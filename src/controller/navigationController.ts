import { EventEmitter } from 'node:events';
import { controllerOptionsSchema, parseOptions, type ControllerOptions, type ControllerOptionsInput } from '@/configuration';
import type { DisplayGeometry, DisplaySink } from '@/display/geometry';
import { FormatError } from '@/errors';
import { composeLine, isOverflow, padLine } from '@/menu/format';
import type { Direction, Menu, RootMenu } from '@/menu/menu';
import { resolveSlot, type ResolvedSlot } from '@/menu/slot';
import { logger } from '@/ui/logger';
import { Marquee } from './marquee';
import {
    INITIAL_STATE,
    clampState,
    cursorToTop,
    maxCursorRow,
    maxIndex,
    maxShift,
    stepDown,
    stepUp,
    type NavigationState,
} from './navigation';

export type InputEvent = 'rotate-left' | 'rotate-right' | 'press';

export type SlotFailure = {
    index: number;
    row: number;
    error: FormatError;
};

export type RenderResult = {
    lines: string[];
    failures: SlotFailure[];
};

export type RenderOptions = {
    /** Keep the horizontal scroll of the selected line if its entry is unchanged. */
    keepScroll?: boolean;
};

export type NavigationControllerOptions = ControllerOptionsInput & {
    display: DisplaySink;
    root: RootMenu;
};

type RowDraw = {
    line: string;
    failure: SlotFailure | null;
};

type DrawnSelection = {
    index: number;
    slot: ResolvedSlot;
};

/**
 * Drives one menu at a time on a character display.
 *
 * Events:
 * - `input` (event: InputEvent) before an input is processed
 * - `selection-changed` (state: NavigationState)
 * - `menu-changed` (menu: Menu, previous: Menu)
 * - `render` (result: RenderResult) after every full render pass
 * - `slot-error` (failure: SlotFailure) for each slot that failed to resolve
 *
 * Nothing is drawn until `set()` is called for the first time.
 */
export class NavigationController extends EventEmitter {
    readonly root: RootMenu;
    readonly geometry: DisplayGeometry;
    private readonly display: DisplaySink;
    private readonly options: ControllerOptions;
    private readonly marquee = new Marquee();
    private menu: Menu;
    private current: NavigationState = INITIAL_STATE;
    private selection: DrawnSelection | null = null;

    constructor(opts: NavigationControllerOptions) {
        super();
        const { display, root, ...rest } = opts;
        this.options = parseOptions(controllerOptionsSchema, rest, 'controller options');
        this.geometry = Object.freeze({ ...this.options.geometry });
        this.display = display;
        this.root = root;
        this.menu = root;
    }

    get activeMenu(): Menu {
        return this.menu;
    }

    get state(): NavigationState {
        return this.current;
    }

    get index(): number {
        return this.current.index;
    }

    get shift(): number {
        return this.current.shift;
    }

    get cursorRow(): number {
        return this.current.cursorRow;
    }

    get slotCount(): number {
        return this.menu.length;
    }

    get maxIndex(): number | null {
        return maxIndex(this.slotCount);
    }

    get maxShift(): number {
        return maxShift(this.slotCount, this.geometry.rows);
    }

    get maxCursorRow(): number {
        return maxCursorRow(this.slotCount, this.geometry.rows);
    }

    /** Columns available to slot text; one less than the display when a cursor glyph takes the gutter. */
    get lineWidth(): number {
        return this.options.cursorGlyph === null ? this.geometry.cols : this.geometry.cols - 1;
    }

    get marqueeOffset(): number {
        return this.marquee.offset;
    }

    handle(event: InputEvent): void {
        this.emit('input', event);
        switch (event) {
            case 'rotate-left':
                this.rotate('L');
                break;
            case 'rotate-right':
                this.rotate('R');
                break;
            case 'press':
                this.press();
                break;
        }
    }

    /**
     * Makes `menu` active, firing its setup callbacks around the switch. When
     * a file menu cannot be read the previous menu and state stay active.
     */
    set(menu: Menu = this.root): void {
        menu.activate(this, () => {
            if (menu.kind === 'file') {
                menu.refreshSlots();
            }
            const previous = this.menu;
            this.menu = menu;
            logger.debug(`[controller] set ${menu.kind} menu (${menu.length} slots)`);
            this.resetNavigation();
            this.emit('menu-changed', menu, previous);
        });
    }

    ifOverflow(index: number): boolean {
        return isOverflow(this.resolveAt(index), this.lineWidth);
    }

    render(opts: RenderOptions = {}): RenderResult {
        const visible = Math.min(this.geometry.rows, this.slotCount);
        const result: RenderResult = { lines: [], failures: [] };
        for (let row = 0; row < visible; row++) {
            const { line, failure } = this.drawRow(row, opts.keepScroll ?? false);
            result.lines.push(line);
            if (failure) result.failures.push(failure);
        }
        this.placeCursor();
        this.emit('render', result);
        this.reportFailures(result.failures);
        return result;
    }

    /** Moves the cursor to the top row, keeping the scroll position. */
    resetCursor(): void {
        const previous = this.current;
        this.current = cursorToTop(previous);
        if (this.current === previous || previous.cursorRow === 0) return;
        this.marquee.reset();
        this.redrawRows(previous.cursorRow, 0);
        this.emit('selection-changed', this.current);
    }

    /** Re-validates navigation after slots were added or removed out of band. */
    resetMenu(): void {
        if (this.menu.kind === 'file') {
            this.menu.refreshSlots();
        }
        this.current = clampState(this.current, this.slotCount, this.geometry.rows);
        this.marquee.reset();
        this.display.clear();
        this.render();
        this.emit('selection-changed', this.current);
    }

    /** Redraws only the selected row, e.g. after `menu.replaceSlot()`. */
    updateCurrentSlot(opts: RenderOptions = {}): void {
        if (this.current.index >= this.slotCount) return;
        const { failure } = this.drawRow(this.current.cursorRow, opts.keepScroll ?? false);
        this.placeCursor();
        this.reportFailures(failure ? [failure] : []);
    }

    /**
     * Scrolls the selected line's entry one character to the left. Returns
     * false when there is nothing (more) to scroll.
     *
     * Works on the line as it was last drawn; dynamic bindings only run
     * again on the next render or `updateCurrentSlot()`.
     */
    tickMarquee(): boolean {
        if (this.slotCount === 0 || this.menu.customCursor) return false;
        const selection = this.selection;
        if (!selection || selection.index !== this.current.index) return false;
        const { slot } = selection;
        const offset = this.marquee.advance(this.current.index, slot, this.lineWidth);
        if (offset === null) return false;
        this.display.writeLine(this.current.cursorRow, this.gutter(this.current.cursorRow) + composeLine(slot, this.lineWidth, offset));
        this.placeCursor();
        return true;
    }

    private rotate(direction: Direction): void {
        const previous = this.current;
        const next = direction === 'R'
            ? stepDown(previous, this.slotCount, this.geometry.rows)
            : stepUp(previous, this.slotCount, this.geometry.rows);
        if (next !== previous) {
            this.current = next;
            this.marquee.reset();
            if (next.shift !== previous.shift) {
                this.render();
            } else {
                this.redrawRows(previous.cursorRow, next.cursorRow);
            }
            this.emit('selection-changed', next);
        }
        this.menu.dispatch({ kind: 'direction', value: direction }, this);
    }

    private press(): void {
        const menu = this.menu;
        if (menu.length === 0) return;
        const index = this.current.index;
        if (menu.kind !== 'file') {
            menu.dispatch({ kind: 'press', value: index }, this);
            return;
        }

        const target = menu.targetAt(index);
        switch (target.kind) {
            case 'prefix':
            case 'root':
                menu.dispatch({ kind: 'press', value: index }, this);
                return;
            case 'parent':
                menu.returnToParent();
                this.resetNavigation();
                return;
            case 'entry': {
                const { entry } = target;
                if (!entry.isDirectory) {
                    menu.dispatch({ kind: 'press', value: index }, this);
                    menu.dispatch({ kind: 'file_press', value: entry.path }, this);
                } else if (menu.customFolderBehavior) {
                    menu.dispatch({ kind: 'press', value: index }, this);
                    menu.dispatch({ kind: 'dir_press', value: entry.path }, this);
                } else {
                    menu.enterDirectory(entry.name);
                    this.resetNavigation();
                }
                return;
            }
        }
    }

    private resetNavigation(): void {
        this.current = INITIAL_STATE;
        this.marquee.reset();
        this.display.clear();
        this.render();
        this.emit('selection-changed', this.current);
    }

    private resolveAt(index: number): ResolvedSlot {
        const slot = this.menu.slots[index];
        if (!slot) {
            throw new RangeError(`Slot index ${index} is out of bounds (0..${this.slotCount - 1})`);
        }
        return resolveSlot(slot);
    }

    private gutter(row: number): string {
        const glyph = this.options.cursorGlyph;
        if (glyph === null) return '';
        const showsCursor = !this.menu.customCursor && this.slotCount > 0 && row === this.current.cursorRow;
        return showsCursor ? glyph : ' ';
    }

    private drawRow(row: number, keepScroll: boolean): RowDraw {
        const index = this.current.shift + row;
        const width = this.lineWidth;
        let line: string;
        let failure: SlotFailure | null = null;
        try {
            const slot = this.resolveAt(index);
            let offset = 0;
            if (index === this.current.index) {
                offset = this.marquee.offsetFor(index, slot, keepScroll);
                this.selection = { index, slot };
            }
            line = this.gutter(row) + composeLine(slot, width, offset);
        } catch (error) {
            if (!(error instanceof FormatError)) throw error;
            if (index === this.current.index) this.selection = null;
            failure = { index, row, error };
            line = this.gutter(row) + padLine(this.options.errorMarker, width);
        }
        this.display.writeLine(row, line);
        return { line, failure };
    }

    private redrawRows(...rows: number[]): void {
        const failures: SlotFailure[] = [];
        for (const row of new Set(rows)) {
            const { failure } = this.drawRow(row, false);
            if (failure) failures.push(failure);
        }
        this.placeCursor();
        this.reportFailures(failures);
    }

    private placeCursor(): void {
        if (this.options.cursorGlyph !== null || this.menu.customCursor || this.slotCount === 0) return;
        this.display.setCursor(this.current.cursorRow, 0);
    }

    private reportFailures(failures: SlotFailure[]): void {
        for (const failure of failures) {
            logger.warn(`[controller] slot ${failure.index} failed to resolve`, failure.error.message);
            this.emit('slot-error', failure);
        }
        if (this.options.strictRender && failures.length > 0) {
            throw failures[0].error;
        }
    }
}
