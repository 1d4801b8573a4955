import { parseOptions, timerOptionsSchema, type MarqueeTimerOptions } from '@/configuration';
import type { NavigationController } from './navigationController';

/**
 * Scrolls an overflowing selected line: waits `startDelayMs` after the
 * selection settles, then steps every `stepMs` until the entry's end is shown.
 */
export class MarqueeTimer {
    private readonly controller: NavigationController;
    private readonly startDelayMs: number;
    private readonly stepMs: number;
    private timer: NodeJS.Timeout | null = null;
    private running = false;

    constructor(controller: NavigationController, opts: MarqueeTimerOptions = {}) {
        const parsed = parseOptions(timerOptionsSchema, opts, 'marquee timer options');
        this.controller = controller;
        this.startDelayMs = parsed.startDelayMs;
        this.stepMs = parsed.stepMs;
    }

    get isRunning(): boolean {
        return this.running;
    }

    start(): void {
        if (this.running) return;
        this.running = true;
        this.controller.on('selection-changed', this.restart);
        this.controller.on('render', this.restart);
        this.schedule(this.startDelayMs);
    }

    stop(): void {
        if (!this.running) return;
        this.running = false;
        this.controller.off('selection-changed', this.restart);
        this.controller.off('render', this.restart);
        this.clear();
    }

    private readonly restart = (): void => {
        this.schedule(this.startDelayMs);
    };

    private readonly step = (): void => {
        this.timer = null;
        if (this.controller.tickMarquee()) {
            this.schedule(this.stepMs);
        }
    };

    private schedule(delayMs: number): void {
        this.clear();
        this.timer = setTimeout(this.step, delayMs);
        this.timer.unref();
    }

    private clear(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }
}
