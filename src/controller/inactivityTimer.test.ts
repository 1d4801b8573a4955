import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { createGeometry } from '@/display/geometry';
import { MemoryDisplay } from '@/display/memoryDisplay';
import { FormatError } from '@/errors';
import { NestedMenu, RootMenu } from '@/menu/menu';
import { InactivityTimer } from './inactivityTimer';
import { NavigationController } from './navigationController';

function setup() {
    const display = new MemoryDisplay(createGeometry(20, 4));
    const root = new RootMenu({ slots: ['#+#Settings#+#'] });
    const nested = new NestedMenu({ slots: ['#+#Volume#+#', '#+#Brightness#+#'] });
    const controller = new NavigationController({ geometry: { cols: 20, rows: 4 }, display, root });
    controller.set();
    return { root, nested, controller };
}

describe('InactivityTimer', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it('returns to the root menu after the timeout', () => {
        const { root, nested, controller } = setup();
        const timer = new InactivityTimer(controller, { timeoutSeconds: 30 });
        timer.start();
        controller.set(nested);

        vi.advanceTimersByTime(29_999);
        expect(controller.activeMenu).toBe(nested);

        vi.advanceTimersByTime(1);
        expect(controller.activeMenu).toBe(root);
        timer.stop();
    });

    it('restarts the countdown on input', () => {
        const { root, nested, controller } = setup();
        const timer = new InactivityTimer(controller, { timeoutSeconds: 30 });
        timer.start();
        controller.set(nested);

        vi.advanceTimersByTime(29_999);
        controller.handle('rotate-right');
        vi.advanceTimersByTime(29_999);
        expect(controller.activeMenu).toBe(nested);

        vi.advanceTimersByTime(1);
        expect(controller.activeMenu).toBe(root);
        timer.stop();
    });

    it('does not re-enter the root menu while it is active', () => {
        const { controller } = setup();
        const menuChanged = vi.fn();
        controller.on('menu-changed', menuChanged);
        const timer = new InactivityTimer(controller, { timeoutSeconds: 1 });
        timer.start();

        vi.advanceTimersByTime(10_000);
        expect(menuChanged).not.toHaveBeenCalled();
        timer.stop();
    });

    it('is disabled by a zero timeout', () => {
        const { nested, controller } = setup();
        const timer = new InactivityTimer(controller, { timeoutSeconds: 0 });
        timer.start();
        controller.set(nested);

        vi.advanceTimersByTime(600_000);
        expect(controller.activeMenu).toBe(nested);
        expect(controller.listenerCount('input')).toBe(0);
    });

    it('stops counting once stopped', () => {
        const { nested, controller } = setup();
        const timer = new InactivityTimer(controller, { timeoutSeconds: 5 });
        timer.start();
        controller.set(nested);
        timer.stop();

        vi.advanceTimersByTime(60_000);
        expect(controller.activeMenu).toBe(nested);
    });

    describe('failing switch back', () => {
        function strictSetup() {
            const display = new MemoryDisplay(createGeometry(20, 4));
            const root = new RootMenu({ slots: ['#+#Settings#+#'] });
            const nested = new NestedMenu({ slots: ['#+#Volume#+#'] });
            const controller = new NavigationController({ geometry: { cols: 20, rows: 4 }, display, root, strictRender: true });
            controller.set();
            controller.set(nested);
            root.replaceSlot(0, 'badformat');
            return { controller };
        }

        beforeEach(() => {
            vi.spyOn(console, 'warn').mockImplementation(() => {});
        });

        it('hands the error to onError', () => {
            const { controller } = strictSetup();
            const onError = vi.fn();
            const timer = new InactivityTimer(controller, { timeoutSeconds: 5, onError });
            timer.start();
            controller.handle('rotate-right');

            vi.advanceTimersByTime(5000);
            expect(onError).toHaveBeenCalledTimes(1);
            expect(onError.mock.calls[0][0]).toBeInstanceOf(FormatError);
            timer.stop();
        });

        it('logs the error by default', () => {
            const error = vi.spyOn(console, 'error').mockImplementation(() => {});
            const { controller } = strictSetup();
            const timer = new InactivityTimer(controller, { timeoutSeconds: 5 });
            timer.start();
            controller.handle('rotate-right');

            vi.advanceTimersByTime(5000);
            expect(error).toHaveBeenCalledTimes(1);
            expect(error.mock.calls[0][0]).toBe(chalk.red('[inactivity] failed to return to the root menu'));
            timer.stop();
        });
    });
});
