import { isOverflow, maxEntryOffset } from '@/menu/format';
import type { ResolvedSlot } from '@/menu/slot';

type MarqueeWindow = {
    index: number;
    offset: number;
    entry: string;
    prefixLength: number;
    suffixLength: number;
};

/** Horizontal window over the entry text of the selected, overflowing line. */
export class Marquee {
    private window: MarqueeWindow | null = null;

    get offset(): number {
        return this.window?.offset ?? 0;
    }

    reset(): void {
        this.window = null;
    }

    /**
     * Offset to draw the selected line with. With `keep`, an unchanged entry
     * (same text, same prefix and suffix lengths) stays where it was scrolled to.
     */
    offsetFor(index: number, slot: ResolvedSlot, keep: boolean): number {
        const current = this.matching(index, slot);
        if (keep && current) return current.offset;
        this.window = windowOf(index, slot, 0);
        return 0;
    }

    /** Moves the window one character right; null once the end of the entry is shown. */
    advance(index: number, slot: ResolvedSlot, width: number): number | null {
        if (!isOverflow(slot, width)) return null;
        const offset = this.matching(index, slot)?.offset ?? 0;
        if (offset >= maxEntryOffset(slot, width)) return null;
        this.window = windowOf(index, slot, offset + 1);
        return offset + 1;
    }

    private matching(index: number, slot: ResolvedSlot): MarqueeWindow | null {
        const current = this.window;
        if (!current) return null;
        if (current.index !== index || current.entry !== slot.entry) return null;
        if (current.prefixLength !== slot.prefix.length || current.suffixLength !== slot.suffix.length) return null;
        return current;
    }
}

function windowOf(index: number, slot: ResolvedSlot, offset: number): MarqueeWindow {
    return {
        index,
        offset,
        entry: slot.entry,
        prefixLength: slot.prefix.length,
        suffixLength: slot.suffix.length,
    };
}
