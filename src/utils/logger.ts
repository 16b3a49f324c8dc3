// src/utils/logger.ts

type LogLevel = 'info' | 'warn' | 'error';

function write(level: LogLevel, component: string, message: string, details: unknown[]) {
    const line = `[${new Date().toISOString()}] [${component}] ${message}`;
    switch (level) {
        case 'warn':
            console.warn(line, ...details);
            break;
        case 'error':
            console.error(line, ...details);
            break;
        default:
            console.log(line, ...details);
    }
}

export interface ComponentLogger {
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger that stamps every line with the time and the component name.
 */
export function createLogger(component: string): ComponentLogger {
    return {
        info: (message, ...details) => write('info', component, message, details),
        warn: (message, ...details) => write('warn', component, message, details),
        error: (message, ...details) => write('error', component, message, details),
    };
}
