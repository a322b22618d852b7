import { describe, it, expect, vi } from 'vitest';
import { LoggerService, LogEntry } from './Logger';

describe('LoggerService', () => {
    it('should notify subscribers until they unsubscribe', () => {
        vi.spyOn(console, 'info').mockImplementation(() => {});
        const logger = new LoggerService();
        const entries: LogEntry[] = [];
        const unsubscribe = logger.subscribe(e => entries.push(e));

        logger.info('first', { n: 1 });
        unsubscribe();
        logger.info('second');

        expect(entries).toHaveLength(1);
        expect(entries[0].level).toBe('info');
        expect(entries[0].message).toBe('first');
        expect(entries[0].data).toEqual({ n: 1 });
    });

    it('should write only entries at or above the level to the console', () => {
        const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const logger = new LoggerService();
        const entries: LogEntry[] = [];
        logger.subscribe(e => entries.push(e));

        logger.debug('hidden');
        logger.warn('shown');
        expect(debug).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledWith('[WARN] shown');
        expect(entries.map(e => e.message)).toEqual(['hidden', 'shown']);

        logger.setLevel('debug');
        logger.debug('now shown');
        expect(debug).toHaveBeenCalledWith('[DEBUG] now shown');
    });
});
