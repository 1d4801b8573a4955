import type { DisplayGeometry, DisplaySink } from './geometry';

export type CursorPosition = {
    row: number;
    col: number;
};

/**
 * Character grid kept in memory. Useful as a preview surface and as the
 * display in tests.
 */
export class MemoryDisplay implements DisplaySink {
    readonly geometry: DisplayGeometry;
    private grid: string[];
    private cursorPosition: CursorPosition | null = null;
    private writes = 0;

    constructor(geometry: DisplayGeometry) {
        this.geometry = geometry;
        this.grid = this.blank();
    }

    writeLine(row: number, text: string): void {
        if (row < 0 || row >= this.geometry.rows) {
            throw new RangeError(`Row ${row} is outside the display (0..${this.geometry.rows - 1})`);
        }
        if (text.length !== this.geometry.cols) {
            throw new RangeError(`Line for row ${row} is ${text.length} characters, expected ${this.geometry.cols}`);
        }
        this.grid[row] = text;
        this.writes += 1;
    }

    setCursor(row: number, col: number): void {
        this.cursorPosition = { row, col };
    }

    clear(): void {
        this.grid = this.blank();
        this.cursorPosition = null;
    }

    get lines(): readonly string[] {
        return this.grid;
    }

    get cursor(): CursorPosition | null {
        return this.cursorPosition;
    }

    get writeCount(): number {
        return this.writes;
    }

    toString(): string {
        return this.grid.join('\n');
    }

    private blank(): string[] {
        return Array.from({ length: this.geometry.rows }, () => ' '.repeat(this.geometry.cols));
    }
}
