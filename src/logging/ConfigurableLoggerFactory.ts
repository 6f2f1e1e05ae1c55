import { createLogger, format, transports } from 'winston';
import type { Format, TransformableInfo } from 'logform';
import DailyRotateFile from 'winston-daily-rotate-file';
import type Transport from 'winston-transport';
import type { Logger, LoggerFactory } from 'global-logger-factory';
import { WinstonLogger } from 'global-logger-factory';
import { logContext } from './LogContext';

export interface ConfigurableLoggerOptions {
  /** Rotating log file pattern; console only when omitted. */
  fileName?: string;
  maxSize?: string;
  maxFiles?: string;
  colorize?: boolean;
}

export class ConfigurableLoggerFactory implements LoggerFactory {
  private readonly level: string;
  private readonly colorize: boolean;
  private readonly fileTransport?: DailyRotateFile;

  public constructor(level: string, options: ConfigurableLoggerOptions = {}) {
    this.level = level;
    this.colorize = options.colorize ?? true;
    if (options.fileName) {
      this.fileTransport = new DailyRotateFile({
        filename: options.fileName,
        datePattern: 'YYYY-MM-DD',
        maxSize: options.maxSize ?? '10m',
        maxFiles: options.maxFiles ?? '14d',
      });
      // Shared by every logger the factory creates.
      this.fileTransport.setMaxListeners(Infinity);
    }
  }

  public createLogger(label: string): Logger {
    return new WinstonLogger(createLogger({
      level: this.level,
      format: this.getFormat(label),
      transports: this.createTransports(label),
    }));
  }

  protected createTransports(label: string): Transport[] {
    const consoleTransport = new transports.Console({
      // Keep stdout free for `--events` output.
      stderrLevels: [ 'error', 'warn', 'info', 'verbose', 'debug', 'silly' ],
      format: this.colorize ? format.combine(format.colorize(), this.getFormat(label)) : this.getFormat(label),
    });
    return this.fileTransport ? [ consoleTransport, this.fileTransport ] : [ consoleTransport ];
  }

  protected getFormat(label: string): Format {
    return format.combine(
      format.label({ label }),
      format.timestamp(),
      format((info) => {
        const store = logContext.getStore();
        if (store?.unit) {
          info.unit = store.unit;
        }
        return info;
      })(),
      format.printf(({ level, message, label: labelInner, timestamp, unit }: TransformableInfo): string => {
        const unitInfo = typeof unit === 'string' ? ` <${unit}>` : '';
        return `${String(timestamp)} [${String(labelInner)}]${unitInfo} ${level}: ${String(message)}`;
      }),
    );
  }
}

