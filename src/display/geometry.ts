import { geometrySchema, parseOptions } from '@/configuration';

export type DisplayGeometry = Readonly<{
    cols: number;
    rows: number;
}>;

export function createGeometry(cols: number, rows: number): DisplayGeometry {
    return Object.freeze(parseOptions(geometrySchema, { cols, rows }, 'display geometry'));
}

/** The write contract the controller needs from a character display. */
export interface DisplaySink {
    /** `text` is always exactly `cols` characters long. */
    writeLine(row: number, text: string): void;
    setCursor(row: number, col: number): void;
    clear(): void;
}
