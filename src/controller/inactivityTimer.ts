import { logger } from '@/ui/logger';
import type { NavigationController } from './navigationController';

export type InactivityTimerOptions = {
    /** 0 disables the timer. */
    timeoutSeconds: number;
    /** Failures of the switch back to the root menu; logged when omitted. */
    onError?: (error: unknown) => void;
};

/** Returns to the root menu after a period without input. */
export class InactivityTimer {
    private readonly controller: NavigationController;
    private readonly timeoutMs: number;
    private readonly onError: (error: unknown) => void;
    private timer: NodeJS.Timeout | null = null;
    private running = false;

    constructor(controller: NavigationController, opts: InactivityTimerOptions) {
        this.controller = controller;
        this.timeoutMs = Math.max(0, opts.timeoutSeconds) * 1000;
        this.onError = opts.onError ?? ((error: unknown) => logger.error('[inactivity] failed to return to the root menu', error));
    }

    start(): void {
        if (this.running || this.timeoutMs === 0) return;
        this.running = true;
        this.controller.on('input', this.touch);
        this.controller.on('menu-changed', this.touch);
        this.arm();
    }

    stop(): void {
        if (!this.running) return;
        this.running = false;
        this.controller.off('input', this.touch);
        this.controller.off('menu-changed', this.touch);
        this.disarm();
    }

    private readonly touch = (): void => {
        this.arm();
    };

    private readonly fire = (): void => {
        this.timer = null;
        if (this.controller.activeMenu === this.controller.root) return;
        logger.debug(`[inactivity] no input for ${this.timeoutMs}ms, returning to root menu`);
        try {
            this.controller.set();
        } catch (error) {
            this.onError(error);
        }
    };

    private arm(): void {
        this.disarm();
        if (this.controller.activeMenu === this.controller.root) return;
        this.timer = setTimeout(this.fire, this.timeoutMs);
        this.timer.unref();
    }

    private disarm(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }
}
