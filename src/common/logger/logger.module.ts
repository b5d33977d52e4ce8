import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WinstonModule } from 'nest-winston';
import * as winston from 'winston';
import { sanitizeFormat } from './log-sanitizer';
import { getRequestContext } from './request-context';

// Adds correlation and ticket ids to every log line written inside a context
export const correlationFormat = winston.format((info) => {
  const context = getRequestContext();
  if (context) {
    info.correlationId = context.correlationId;
    if (context.ticketId) {
      info.ticketId = context.ticketId;
    }
  }
  return info;
});

export function createLoggerOptions(nodeEnv: string | undefined): winston.LoggerOptions {
  const isProduction = nodeEnv === 'production';

  return {
    level: isProduction ? 'info' : 'debug',
    silent: nodeEnv === 'test',
    format: winston.format.combine(
      winston.format.timestamp(),
      correlationFormat(),
      sanitizeFormat(),
      isProduction
        ? winston.format.json()
        : winston.format.combine(
            winston.format.colorize(),
            winston.format.printf(({ level, message, timestamp, correlationId, ticketId, context, ...meta }) => {
              const corrId = correlationId ? `[${String(correlationId).substring(0, 8)}]` : '';
              const ticket = ticketId ? `[ticket ${String(ticketId).substring(0, 8)}]` : '';
              const ctx = context ? `[${String(context)}]` : '';
              const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
              return `${String(timestamp)} ${level} ${corrId}${ticket}${ctx} ${String(message)} ${metaStr}`;
            }),
          ),
    ),
    transports: [new winston.transports.Console()],
  };
}

@Global()
@Module({
  imports: [
    WinstonModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => createLoggerOptions(configService.get<string>('NODE_ENV')),
    }),
  ],
  exports: [WinstonModule],
})
export class LoggerModule {}
