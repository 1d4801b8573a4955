import type { NavigationController } from '@/controller/navigationController';
import { logger } from '@/ui/logger';
import type { FileMenu } from './fileMenu';
import { toSlot, type Slot, type SlotInput } from './slot';

export type MenuKind = 'root' | 'nested' | 'file';

export type Direction = 'L' | 'R';

export type MenuEvent =
    | { kind: 'setup'; value: null }
    | { kind: 'after_setup'; value: null }
    | { kind: 'press'; value: number }
    | { kind: 'dir_press'; value: string }
    | { kind: 'file_press'; value: string }
    | { kind: 'direction'; value: Direction };

export type MenuEventKind = MenuEvent['kind'];

export type ValueCallback = (event: MenuEvent, menu: Menu, controller: NavigationController) => void;

export type MenuBaseOptions = {
    onValue?: ValueCallback;
    /** Fire `setup` before the menu becomes active. */
    setupCallback?: boolean;
    /** Fire `after_setup` once the menu is active and drawn. */
    afterSetupCallback?: boolean;
    /** The controller keeps navigating but leaves cursor presentation to the callback. */
    customCursor?: boolean;
};

export type ListMenuOptions = MenuBaseOptions & {
    slots?: SlotInput[];
};

export abstract class MenuBase<K extends MenuKind> {
    abstract readonly kind: K;
    readonly onValue: ValueCallback | null;
    readonly setupCallback: boolean;
    readonly afterSetupCallback: boolean;
    readonly customCursor: boolean;
    protected items: Slot[] = [];

    constructor(opts: MenuBaseOptions) {
        this.onValue = opts.onValue ?? null;
        this.setupCallback = opts.setupCallback ?? false;
        this.afterSetupCallback = opts.afterSetupCallback ?? false;
        this.customCursor = opts.customCursor ?? false;
    }

    protected abstract self(): Menu;

    get slots(): readonly Slot[] {
        return this.items;
    }

    get length(): number {
        return this.items.length;
    }

    /**
     * Swaps the slot at `index`. Nothing is redrawn; follow up with
     * `controller.updateCurrentSlot()` or `controller.render()`.
     */
    replaceSlot(index: number, slot: SlotInput): void {
        assertIndex(index, this.items.length);
        this.items[index] = toSlot(slot);
    }

    activate(controller: NavigationController, apply: () => void): void {
        if (this.setupCallback) {
            this.dispatch({ kind: 'setup', value: null }, controller);
        }
        apply();
        if (this.afterSetupCallback) {
            this.dispatch({ kind: 'after_setup', value: null }, controller);
        }
    }

    dispatch(event: MenuEvent, controller: NavigationController): void {
        logger.debug(`[menu] ${this.kind} <- ${event.kind}`, event.value);
        this.onValue?.(event, this.self(), controller);
    }
}

abstract class ListMenu<K extends 'root' | 'nested'> extends MenuBase<K> {
    constructor(opts: ListMenuOptions) {
        super(opts);
        this.items = (opts.slots ?? []).map(toSlot);
    }

    /** Structural changes need `controller.resetMenu()` afterwards. */
    setSlots(slots: SlotInput[]): void {
        this.items = slots.map(toSlot);
    }

    insertSlot(index: number, slot: SlotInput): void {
        assertIndex(index, this.items.length + 1);
        this.items.splice(index, 0, toSlot(slot));
    }

    removeSlot(index: number): Slot {
        assertIndex(index, this.items.length);
        const [removed] = this.items.splice(index, 1);
        return removed;
    }
}

export class RootMenu extends ListMenu<'root'> {
    readonly kind = 'root' as const;

    protected self(): Menu {
        return this;
    }
}

export class NestedMenu extends ListMenu<'nested'> {
    readonly kind = 'nested' as const;

    protected self(): Menu {
        return this;
    }
}

export type Menu = RootMenu | NestedMenu | FileMenu;

export function assertIndex(index: number, length: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
        throw new RangeError(`Slot index ${index} is out of bounds (0..${length - 1})`);
    }
}
