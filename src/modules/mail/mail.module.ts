import { MailerModule, type MailerOptions } from '@nestjs-modules/mailer';
import { DynamicModule, Module } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import mailConfig from '../../config/mail.config';
import { NotifierDriver } from '../../config/pipeline.config';
import { ResilienceModule } from '../../common/resilience/resilience.module';
import { Notifier } from './notifier';
import { LogNotifier } from './services/log-notifier.service';
import { MailNotifier } from './services/mail-notifier.service';
import { MailTemplateService } from './services/mail-template.service';

export const createMailerOptions = (config: ConfigType<typeof mailConfig>): MailerOptions => ({
  transport: {
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    auth: config.user ? { user: config.user, pass: config.pass } : undefined,
  },
  defaults: {
    from: config.from,
  },
});

/**
 * Provides the `Notifier` capability: SMTP through the mailer, or the log
 * for local runs.
 */
@Module({})
export class MailModule {
  static register(driver: NotifierDriver): DynamicModule {
    if (driver === 'log') {
      return {
        module: MailModule,
        providers: [MailTemplateService, LogNotifier, { provide: Notifier, useExisting: LogNotifier }],
        exports: [Notifier],
      };
    }

    return {
      module: MailModule,
      imports: [
        MailerModule.forRootAsync({
          inject: [mailConfig.KEY],
          useFactory: (config: ConfigType<typeof mailConfig>) => createMailerOptions(config),
        }),
        ResilienceModule.forRoot([{ name: 'mail', timeout: mailConfig().breakerTimeoutMs }]),
      ],
      providers: [MailTemplateService, MailNotifier, { provide: Notifier, useExisting: MailNotifier }],
      exports: [Notifier],
    };
  }
}
