export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
    timestamp: number;
    message: string;
    level: LogLevel;
}

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
    info: line => console.log(line),
    warn: line => console.warn(line),
    error: line => console.error(line)
};

export class DebugLogger {
    private logs: LogEntry[] = [];
    private listeners: (() => void)[] = [];

    constructor(private readonly maxLogs = 100, private readonly echoToConsole = true) {}

    log(message: string, level: LogLevel = 'info') {
        const entry = { timestamp: Date.now(), message, level };
        this.logs.unshift(entry);
        if (this.logs.length > this.maxLogs) {
            this.logs.pop();
        }
        if (this.echoToConsole) {
            CONSOLE_WRITERS[level](`[${level.toUpperCase()}] ${message}`);
        }
        this.notify();
    }

    error(message: string) {
        this.log(message, 'error');
    }

    warn(message: string) {
        this.log(message, 'warn');
    }

    getLogs() {
        return [...this.logs];
    }

    clear() {
        this.logs = [];
        this.notify();
    }

    subscribe(listener: () => void) {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    private notify() {
        this.listeners.forEach(l => l());
    }
}

export const debugLog = new DebugLogger();
