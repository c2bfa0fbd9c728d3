import * as fs from 'fs';

// Structured logging utility
interface LogEntry {
    level: 'info' | 'warn' | 'error';
    message: string;
    timestamp: string;
    context?: Record<string, unknown>;
}

let fileErrorReported = false;

export function log(level: LogEntry['level'], message: string, context?: Record<string, unknown>): void {
    const entry: LogEntry = {
        level,
        message,
        timestamp: new Date().toISOString(),
        context
    };

    // Log to console
    console.log(JSON.stringify(entry));

    // Also append to a log file when one is configured
    const logFile = process.env.LOG_FILE;
    if (!logFile) return;
    try {
        const logMessage = `${entry.timestamp} [${level.toUpperCase()}] ${message}${context ? ' ' + JSON.stringify(context) : ''}\n`;
        fs.appendFileSync(logFile, logMessage);
    } catch (err) {
        if (!fileErrorReported) {
            fileErrorReported = true;
            console.error(`Failed to write log file ${logFile}:`, err);
        }
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
