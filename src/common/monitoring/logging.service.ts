import { Injectable } from '@nestjs/common';
import { hostname } from 'os';
import * as winston from 'winston';
import LokiTransport from 'winston-loki';

export type LogMeta = Record<string, unknown>;

@Injectable()
export class LoggingService {
  private logger: winston.Logger;

  constructor() {
    const environment = process.env.NODE_ENV || 'development';
    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp(),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            return `${timestamp} [${level}]: ${message} ${
              Object.keys(meta).length ? JSON.stringify(meta, jsonReplacer) : ''
            }`;
          }),
        ),
      }),
    ];

    // Loki is optional: only ship logs when a host is configured
    if (process.env.LOKI_HOST) {
      transports.push(
        new LokiTransport({
          host: process.env.LOKI_HOST,
          labels: {
            app: 'ledger-transfer-service',
            service: 'ledger-service',
            environment,
          },
          json: true,
          format: winston.format.json(),
          replaceTimestamp: true,
          batching: true,
          interval: 5,
          onConnectionError: (err: unknown) =>
            console.error('Loki connection error:', err),
        }),
      );
    }

    this.logger = winston.createLogger({
      level: process.env.LOG_LEVEL || 'info',
      silent: environment === 'test',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json({ replacer: jsonReplacer }),
      ),
      defaultMeta: {
        service: 'ledger-service',
        host: hostname(),
        environment,
      },
      transports,
    });
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.logger.error(message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  // Commands
  logHandlerStart(handlerName: string, args: LogMeta): void {
    this.logger.info('Handler execution started', {
      handlerName,
      handlerType: handlerName.includes('Command') ? 'command' : 'query',
      args,
      timestamp: Date.now(),
    });
  }

  logCommandSuccess(
    commandName: string,
    args: LogMeta,
    duration: number,
    result?: unknown,
  ): void {
    this.logger.info('Command execution succeeded', {
      commandName,
      commandType: 'command',
      args,
      duration,
      output: result ?? null,
      success: true,
      timestamp: Date.now(),
    });
  }

  logCommandError(commandName: string, error: unknown, args?: LogMeta): void {
    this.logger.error('Command execution failed', {
      commandName,
      commandType: 'command',
      ...describeError(error),
      args,
      success: false,
    });
  }

  // Queries
  logQueryStart(queryName: string, args: LogMeta): void {
    this.logger.info('Query execution started', {
      queryName,
      queryType: 'query',
      args,
      timestamp: Date.now(),
    });
  }

  logQuerySuccess(
    queryName: string,
    args: LogMeta,
    duration: number,
    result?: unknown,
  ): void {
    this.logger.info('Query execution succeeded', {
      queryName,
      queryType: 'query',
      args,
      duration,
      result: result ?? null,
      success: true,
      timestamp: Date.now(),
    });
  }

  logQueryError(queryName: string, error: unknown, args?: LogMeta): void {
    this.logger.error('Query execution failed', {
      queryName,
      queryType: 'query',
      ...describeError(error),
      args,
      success: false,
      timestamp: Date.now(),
    });
  }

  // API routes
  logRoute(route: string, method: string, requestParams: unknown): void {
    this.logger.info('API route called', {
      route,
      method,
      requestType: 'http',
      args: requestParams,
      timestamp: Date.now(),
    });
  }
}

function describeError(error: unknown): { error: string; stack?: string } {
  return error instanceof Error
    ? { error: error.message, stack: error.stack }
    : { error: String(error) };
}

// Balances are bigint minor units, which JSON.stringify rejects
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
