import { ConsoleLogger, LogLevel } from '@nestjs/common';
import { appendFileSync } from 'fs';
import moment from 'moment';
import { inspect } from 'util';

const LEVEL_NAMES: Record<LogLevel, string> = {
    log: 'INFO',
    error: 'ERROR',
    warn: 'WARNING',
    debug: 'DEBUG',
    verbose: 'DEBUG',
    fatal: 'CRITICAL',
};

export function formatLogLine(timestamp: Date, logLevel: LogLevel, message: unknown, context?: string): string {
    const text = typeof message === 'string' ? message : inspect(message);
    const scope = context ? `[${context}] ` : '';
    return `${moment(timestamp).format('YYYY-MM-DD HH:mm:ss,SSS')} - ${LEVEL_NAMES[logLevel]} - ${scope}${text}`;
}

/**
 * Nest console logger that also appends every printed line to the run log
 * file. The file is opened in append mode on each write and never truncated,
 * so it accumulates across runs and is what the landlord receives.
 */
export class RunLogger extends ConsoleLogger {
    constructor(readonly logFilePath: string) {
        super();
    }

    protected printMessages(
        messages: unknown[],
        context = '',
        logLevel: LogLevel = 'log',
        writeStreamType?: 'stdout' | 'stderr',
    ): void {
        super.printMessages(messages, context, logLevel, writeStreamType);
        const now = new Date();
        this.append(messages.map((message) => formatLogLine(now, logLevel, message, context)));
    }

    protected printStackTrace(stack: string): void {
        super.printStackTrace(stack);
        if (stack) {
            this.append([stack]);
        }
    }

    private append(lines: string[]): void {
        try {
            appendFileSync(this.logFilePath, `${lines.join('\n')}\n`, 'utf8');
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            process.stderr.write(`Could not write to log file ${this.logFilePath}: ${reason}\n`);
        }
    }
}
