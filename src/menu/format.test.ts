import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@/errors';
import { composeLine, formatSource, isOverflow, maxEntryOffset, padLine, parseAffix } from './format';

describe('format', () => {
    it('pads and cuts lines to the exact width', () => {
        expect(padLine('C', 5)).toBe('C    ');
        expect(padLine('abcdef', 4)).toBe('abcd');
        expect(padLine('abcd', 4)).toBe('abcd');
    });

    it('pads lines that fit', () => {
        expect(composeLine({ prefix: '[', entry: 'ab', suffix: ']' }, 6)).toBe('[ab]  ');
    });

    it('shortens the entry of overflowing lines and keeps the affixes', () => {
        const slot = { prefix: '>', entry: 'abcdefgh', suffix: '<' };

        expect(isOverflow(slot, 6)).toBe(true);
        expect(composeLine(slot, 6)).toBe('>abcd<');
        expect(composeLine(slot, 6, 2)).toBe('>cdef<');
        expect(composeLine(slot, 6, 99)).toBe('>efgh<');
        expect(maxEntryOffset(slot, 6)).toBe(4);
    });

    it('cuts the whole line when the affixes alone are too wide', () => {
        expect(composeLine({ prefix: 'abcd', entry: 'x', suffix: 'efgh' }, 6)).toBe('abcdxe');
    });

    it('has no scroll range for lines that fit', () => {
        expect(maxEntryOffset({ prefix: '', entry: 'abc', suffix: '' }, 6)).toBe(0);
    });

    it('parses affixes around a single divider', () => {
        expect(parseAffix('[#+#]', 'Directory')).toEqual({ prefix: '[', suffix: ']' });
        expect(parseAffix('#+#', 'Directory')).toEqual({ prefix: '', suffix: '' });
    });

    it('rejects affixes without exactly one divider', () => {
        expect(() => parseAffix('nodivider', 'Directory')).toThrow(ConfigurationError);
        expect(() => parseAffix('nodivider', 'Directory')).toThrow('Directory affix "nodivider" must contain the divider exactly once, found 0');
        expect(() => parseAffix('#+##+#', 'Directory')).toThrow('found 2');
    });

    it('formats slot sources from an affix', () => {
        expect(formatSource({ prefix: '[', suffix: ']' }, 'sub')).toBe('[#+#sub#+#]');
    });
});
