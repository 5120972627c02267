import { Dialect, Options } from 'sequelize';
import { logger } from '@/utils/logger';

const sqlLogger = (query: string): void => {
    logger.debug('SQL Query', { query });
};

const useSsl = process.env.DB_SSL === 'true';

export const databaseConfig: Options = {
    dialect: (process.env.DB_DIALECT || 'postgres') as Dialect,
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'password',
    database: process.env.DB_NAME || 'shipments',
    logging: process.env.NODE_ENV === 'development' ? sqlLogger : false,
    pool: {
        max: parseInt(process.env.DB_POOL_MAX || '5', 10),
        min: 0,
        idle: 10000
    },
    ...(useSsl ? { dialectOptions: { ssl: { require: true, rejectUnauthorized: false } } } : {})
};
