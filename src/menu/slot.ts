import { FormatError } from '@/errors';

/** Separates prefix, entry and suffix inside a slot source. */
export const DIVIDER = '#+#';

export type ResolvedSlot = {
    prefix: string;
    entry: string;
    suffix: string;
};

/**
 * A callable bound to fixed arguments. Dynamic slots invoke it once per
 * resolution, so counters and other caller-owned state advance every render.
 */
export type SlotBinding = {
    readonly call: () => unknown;
};

export type StaticSlot = {
    readonly kind: 'static';
    readonly source: string;
};

export type DynamicSlot = {
    readonly kind: 'dynamic';
    readonly template: string;
    readonly bindings: Readonly<Record<string, SlotBinding>>;
};

export type Slot = StaticSlot | DynamicSlot;

export type SlotInput = string | Slot;

export function staticSlot(source: string): StaticSlot {
    return { kind: 'static', source };
}

export function dynamicSlot(template: string, bindings: Record<string, SlotBinding>): DynamicSlot {
    return { kind: 'dynamic', template, bindings: { ...bindings } };
}

export function bind<A extends unknown[]>(fn: (...args: A) => unknown, ...args: A): SlotBinding {
    return { call: () => fn(...args) };
}

export function toSlot(input: SlotInput): Slot {
    return typeof input === 'string' ? staticSlot(input) : input;
}

export function countDividers(source: string): number {
    return source.split(DIVIDER).length - 1;
}

export function splitSource(source: string): ResolvedSlot {
    const parts = source.split(DIVIDER);
    if (parts.length !== 3) {
        throw new FormatError(source, parts.length - 1);
    }
    const [prefix, entry, suffix] = parts;
    return { prefix, entry, suffix };
}

export function substitute(template: string, bindings: Readonly<Record<string, SlotBinding>>): string {
    let text = template;
    for (const [name, binding] of Object.entries(bindings)) {
        text = text.split(`{${name}}`).join(String(binding.call()));
    }
    return text;
}

export function resolveSlot(slot: Slot): ResolvedSlot {
    switch (slot.kind) {
        case 'static':
            return splitSource(slot.source);
        case 'dynamic':
            return splitSource(substitute(slot.template, slot.bindings));
    }
}

/** Raw text of a slot, for logs. Never invokes dynamic bindings. */
export function describeSlot(slot: Slot): string {
    return slot.kind === 'static' ? slot.source : slot.template;
}
