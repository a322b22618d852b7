export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

export interface LogEntry {
    timestamp: number;
    level: LogLevel;
    message: string;
    data?: unknown;
}

type LogListener = (entry: LogEntry) => void;

export class LoggerService {
    private listeners: LogListener[] = [];
    private minLevel: LogLevel = 'info';

    public subscribe(listener: LogListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    /**
     * Minimum level written to the console. Subscribers still get everything.
     */
    public setLevel(level: LogLevel) {
        this.minLevel = level;
    }

    private emit(level: LogLevel, message: string, data?: unknown) {
        const entry: LogEntry = {
            timestamp: Date.now(),
            level,
            message,
            data
        };

        if (LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel]) {
            if (data === undefined) {
                console[level](`[${level.toUpperCase()}] ${message}`);
            } else {
                console[level](`[${level.toUpperCase()}] ${message}`, data);
            }
        }

        this.listeners.forEach(l => l(entry));
    }

    public info(msg: string, data?: unknown) { this.emit('info', msg, data); }
    public warn(msg: string, data?: unknown) { this.emit('warn', msg, data); }
    public error(msg: string, data?: unknown) { this.emit('error', msg, data); }
    public debug(msg: string, data?: unknown) { this.emit('debug', msg, data); }
}

export const Logger = new LoggerService();
