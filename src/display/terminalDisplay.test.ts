import { describe, it, expect } from 'vitest';
import { createGeometry } from './geometry';
import { TerminalDisplay, ansi } from './terminalDisplay';

function recorder() {
    const chunks: string[] = [];
    return { chunks, output: { write: (chunk: string) => chunks.push(chunk) } };
}

describe('TerminalDisplay', () => {
    it('addresses rows relative to the top-left terminal cell', () => {
        const { chunks, output } = recorder();
        const display = new TerminalDisplay(createGeometry(4, 2), { output });
        display.writeLine(1, 'ab  ');

        expect(chunks).toEqual(['\x1b[?25l\x1b[2;1Hab  ']);
    });

    it('shows the terminal cursor at the requested cell', () => {
        const { chunks, output } = recorder();
        const display = new TerminalDisplay(createGeometry(4, 2), { output, origin: { row: 5, col: 3 } });
        display.setCursor(1, 0);

        expect(chunks).toEqual([ansi.moveTo(6, 3) + ansi.showCursor]);
    });

    it('blanks the display area in one write', () => {
        const { chunks, output } = recorder();
        const display = new TerminalDisplay(createGeometry(3, 2), { output });
        display.clear();

        expect(chunks).toEqual(['\x1b[?25l\x1b[1;1H   \x1b[2;1H   ']);
    });
});
