import { registerAs } from '@nestjs/config';

export default registerAs('mail', () => ({
  host: process.env.MAIL_HOST || 'localhost',
  port: parseInt(process.env.MAIL_PORT || '587', 10),
  user: process.env.MAIL_USER,
  pass: process.env.MAIL_PASS,
  from: process.env.MAIL_FROM || '"Equipe de Garantia" <noreply@example.com>',
  breakerTimeoutMs: parseInt(process.env.MAIL_BREAKER_TIMEOUT_MS || '10000', 10),
}));
