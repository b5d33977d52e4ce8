import { registerAs } from '@nestjs/config';
import { CreateTicketsTable1729300000000 } from '../database/migrations/1729300000000-CreateTicketsTable';

export default registerAs('database', () => ({
  type: 'postgres' as const,
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  username: process.env.DB_USERNAME || 'warranty',
  password: process.env.DB_PASSWORD || 'warranty',
  database: process.env.DB_DATABASE || 'warranty',
  synchronize: process.env.DB_SYNCHRONIZE === 'true',
  autoLoadEntities: true,
  migrations: [CreateTicketsTable1729300000000],
  migrationsRun: process.env.DB_MIGRATIONS_RUN !== 'false',
  logging: process.env.NODE_ENV === 'development',
}));
