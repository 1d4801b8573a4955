import { ConfigurationError } from '@/errors';
import { DIVIDER, countDividers, type ResolvedSlot } from './slot';

export type Affix = {
    prefix: string;
    suffix: string;
};

export const EMPTY_AFFIX: Affix = { prefix: '', suffix: '' };

export function padLine(text: string, width: number): string {
    return text.length >= width ? text.slice(0, width) : text + ' '.repeat(width - text.length);
}

export function composedLength(slot: ResolvedSlot): number {
    return slot.prefix.length + slot.entry.length + slot.suffix.length;
}

export function isOverflow(slot: ResolvedSlot, width: number): boolean {
    return composedLength(slot) > width;
}

/** Columns left for the entry once prefix and suffix are placed. */
export function entrySpace(slot: ResolvedSlot, width: number): number {
    return width - slot.prefix.length - slot.suffix.length;
}

/** Last offset at which the entry window still ends on the entry's final character. */
export function maxEntryOffset(slot: ResolvedSlot, width: number): number {
    const space = entrySpace(slot, width);
    if (space <= 0 || !isOverflow(slot, width)) return 0;
    return slot.entry.length - space;
}

/**
 * Fits a resolved slot into exactly `width` columns.
 *
 * Overflowing lines keep their prefix and suffix and show a window of the
 * entry starting at `offset`. When prefix and suffix alone do not fit, the
 * composed line is cut at `width`.
 */
export function composeLine(slot: ResolvedSlot, width: number, offset = 0): string {
    const full = slot.prefix + slot.entry + slot.suffix;
    if (!isOverflow(slot, width)) {
        return padLine(full, width);
    }
    const space = entrySpace(slot, width);
    if (space <= 0) {
        return full.slice(0, width);
    }
    const start = Math.max(0, Math.min(offset, maxEntryOffset(slot, width)));
    return slot.prefix + slot.entry.slice(start, start + space) + slot.suffix;
}

export function formatSource(affix: Affix, entry: string): string {
    return `${affix.prefix}${DIVIDER}${entry}${DIVIDER}${affix.suffix}`;
}

/** Parses `"<prefix>#+#<suffix>"` into its two halves. */
export function parseAffix(affix: string, label: string): Affix {
    const count = countDividers(affix);
    if (count !== 1) {
        throw new ConfigurationError(`${label} affix "${affix}" must contain the divider exactly once, found ${count}`);
    }
    const [prefix, suffix] = affix.split(DIVIDER);
    return { prefix, suffix };
}
