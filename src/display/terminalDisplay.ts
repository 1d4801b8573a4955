import type { DisplayGeometry, DisplaySink } from './geometry';

const CSI = '\x1b[';

export const ansi = {
    moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
    showCursor: `${CSI}?25h`,
    hideCursor: `${CSI}?25l`,
};

export type TerminalDisplayOptions = {
    output: { write(chunk: string): unknown };
    /** 1-based terminal cell of the display's top-left corner. */
    origin?: { row: number; col: number };
};

/** Emulates a character display inside a terminal with ANSI cursor addressing. */
export class TerminalDisplay implements DisplaySink {
    readonly geometry: DisplayGeometry;
    private readonly output: TerminalDisplayOptions['output'];
    private readonly origin: { row: number; col: number };

    constructor(geometry: DisplayGeometry, opts: TerminalDisplayOptions) {
        this.geometry = geometry;
        this.output = opts.output;
        this.origin = opts.origin ?? { row: 1, col: 1 };
    }

    writeLine(row: number, text: string): void {
        this.output.write(ansi.hideCursor + this.position(row, 0) + text);
    }

    setCursor(row: number, col: number): void {
        this.output.write(this.position(row, col) + ansi.showCursor);
    }

    clear(): void {
        const blank = ' '.repeat(this.geometry.cols);
        let frame = ansi.hideCursor;
        for (let row = 0; row < this.geometry.rows; row++) {
            frame += this.position(row, 0) + blank;
        }
        this.output.write(frame);
    }

    private position(row: number, col: number): string {
        return ansi.moveTo(this.origin.row + row, this.origin.col + col);
    }
}
