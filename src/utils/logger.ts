import fs from 'fs';
import path from 'path';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
}

const LogEmoji: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: '🟪',
    [LogLevel.INFO]: '🟦',
    [LogLevel.WARN]: '🟧',
    [LogLevel.ERROR]: '🟥',
};

interface LogSink {
    write(chunk: string): unknown;
}

function parseLevel(value: string | undefined): LogLevel | undefined {
    const name = value?.toUpperCase();
    switch (name) {
        case 'DEBUG':
            return LogLevel.DEBUG;
        case 'INFO':
            return LogLevel.INFO;
        case 'WARN':
            return LogLevel.WARN;
        case 'ERROR':
            return LogLevel.ERROR;
        default:
            return undefined;
    }
}

function parseFlag(value: string | undefined): boolean {
    const flag = value?.toLowerCase();
    return flag === 'true' || flag === '1' || flag === 'yes';
}

/**
 * Превращает любое значение ошибки в строку для логов и диагностик
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function formatArg(arg: unknown): string {
    if (arg instanceof Error) {
        return arg.stack || arg.message;
    }
    if (typeof arg === 'object' && arg !== null) {
        try {
            return JSON.stringify(arg, null, 2);
        } catch {
            return '[Unserializable Object]';
        }
    }
    return String(arg);
}

export class Logger {
    private level: LogLevel = LogLevel.INFO;
    private readonly scope?: string;
    private sink?: LogSink;
    private showTimestamp = false;

    constructor(scope?: string, parent?: Logger) {
        this.scope = scope;
        // Дочерний логгер пишет в поток родителя и не открывает свой
        if (parent) {
            this.level = parent.level;
            this.showTimestamp = parent.showTimestamp;
            this.sink = parent.sink;
            return;
        }

        this.level = parseLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;
        this.showTimestamp = parseFlag(process.env.LOG_SHOW_TIMESTAMP);

        const logFilePath = process.env.LOG_FILE_PATH;
        if (logFilePath) {
            try {
                const logDir = path.dirname(logFilePath);
                if (!fs.existsSync(logDir)) {
                    fs.mkdirSync(logDir, {recursive: true});
                }
                this.sink = fs.createWriteStream(logFilePath, {flags: 'a'});
            } catch (error) {
                process.stderr.write(`Failed to create log stream for ${logFilePath}: ${describeError(error)}\n`);
            }
        }
    }

    public isDebugEnabled(): boolean {
        return this.level <= LogLevel.DEBUG;
    }

    /**
     * Дочерний логгер со своей областью, но общим уровнем и потоком
     */
    public child(scope: string): Logger {
        return new Logger(scope, this);
    }

    private formatMessage(level: LogLevel, message: string, args: unknown[]): string {
        const timestampPart = this.showTimestamp ? ` [${new Date().toISOString()}]` : '';
        const scopePart = this.scope ? ` [${this.scope}]` : '';
        const argsPart = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';

        return `${LogEmoji[level]}${timestampPart} [${LogLevel[level]}]${scopePart} ${message}${argsPart}\n`;
    }

    private write(level: LogLevel, message: string, args: unknown[]) {
        if (level < this.level) return;

        const formatted = this.formatMessage(level, message, args);
        // stdout принадлежит CLI и транспорту MCP
        if (this.sink) {
            this.sink.write(formatted);
        } else {
            process.stderr.write(formatted);
        }
    }

    debug(message: string, ...args: unknown[]) {
        this.write(LogLevel.DEBUG, message, args);
    }

    info(message: string, ...args: unknown[]) {
        this.write(LogLevel.INFO, message, args);
    }

    warn(message: string, ...args: unknown[]) {
        this.write(LogLevel.WARN, message, args);
    }

    error(message: string, ...args: unknown[]) {
        this.write(LogLevel.ERROR, message, args);
    }
}

export const logger = new Logger();
