import { emitKeypressEvents } from 'node:readline';
import type { InputEvent } from '@/controller/navigationController';
import { logger } from '@/ui/logger';

export type KeyBindings = Readonly<Record<InputEvent, readonly string[]>>;

export const DEFAULT_KEY_BINDINGS: KeyBindings = {
    'rotate-left': ['left', 'up', 'k'],
    'rotate-right': ['right', 'down', 'j'],
    press: ['return', 'enter', 'space'],
};

export type Keypress = {
    name?: string;
    ctrl?: boolean;
};

export type KeypressInputOptions = {
    input: NodeJS.ReadableStream & {
        isTTY?: boolean;
        setRawMode?: (value: boolean) => unknown;
    };
    target: { handle(event: InputEvent): void };
    bindings?: KeyBindings;
    /** Ctrl+C. */
    onExit?: () => void;
    onError?: (error: unknown) => void;
};

export function keyToInputEvent(key: Keypress | undefined, bindings: KeyBindings = DEFAULT_KEY_BINDINGS): InputEvent | null {
    const name = key?.name;
    if (!name || key?.ctrl) return null;
    for (const event of ['rotate-left', 'rotate-right', 'press'] as const) {
        if (bindings[event].includes(name)) return event;
    }
    return null;
}

/**
 * Feeds terminal keys into a controller: arrows turn the encoder, Enter or
 * Space presses its button. Returns a function that detaches and restores the
 * terminal.
 */
export function attachKeypressInput(opts: KeypressInputOptions): () => void {
    const { input, target } = opts;
    const bindings = opts.bindings ?? DEFAULT_KEY_BINDINGS;
    const onError = opts.onError ?? ((error: unknown) => logger.error('[input] failed to handle key', error));

    emitKeypressEvents(input);
    if (input.isTTY) {
        input.setRawMode?.(true);
    }

    const listener = (_text: string | undefined, key: Keypress | undefined) => {
        if (key?.ctrl && key.name === 'c') {
            opts.onExit?.();
            return;
        }
        const event = keyToInputEvent(key, bindings);
        if (!event) return;
        try {
            target.handle(event);
        } catch (error) {
            onError(error);
        }
    };

    input.on('keypress', listener);
    input.resume();

    return () => {
        input.off('keypress', listener);
        if (input.isTTY) {
            input.setRawMode?.(false);
        }
        input.pause();
    };
}
