import { describe, it, expect } from 'vitest';
import { StandardLrcParser } from './StandardLrcParser';

describe('StandardLrcParser', () => {
    const parser = new StandardLrcParser();

    it('should parse simple lyrics', () => {
        const lrc = `[00:01.00]Hello World
[00:02.50]Bye World`;
        const data = parser.parse(lrc);

        expect(data.lines).toHaveLength(2);
        expect(data.lines[0].startTime).toBe(1000);
        expect(data.lines[0].text).toBe('Hello World');
        expect(data.lines[1].startTime).toBe(2500);
    });

    it('should not count ID tags as lines', () => {
        const lrc = `[ti:Test Song]
[ar:Tester]
[00:01.00]Line 1`;
        const data = parser.parse(lrc);

        expect(data.lines).toEqual([{ startTime: 1000, text: 'Line 1' }]);
    });

    it('should expand repeated timestamps and sort by time', () => {
        const data = parser.parse('[00:10.00][00:02.00]Chorus\r\n[00:05.000]Verse');

        expect(data.lines.map(l => [l.startTime, l.text])).toEqual([
            [2000, 'Chorus'],
            [5000, 'Verse'],
            [10000, 'Chorus'],
        ]);
    });

    it('should keep file order for lines sharing a timestamp', () => {
        const data = parser.parse(`[00:01.00]Original
[00:01.00]Translation`);

        expect(data.lines.map(l => l.text)).toEqual(['Original', 'Translation']);
    });

    it('should skip untimed text', () => {
        expect(parser.parse('plain words\n\n').lines).toEqual([]);
    });
});
