import { Sequelize } from 'sequelize';
import { databaseConfig } from './database.config';
import { initModels } from '@/models';
import { logger } from '@/utils';

class Database {
    private static instance: Database;
    private readonly sequelize: Sequelize;
    private isInitialized = false;

    private constructor() {
        this.sequelize = new Sequelize(databaseConfig);
        initModels(this.sequelize);
    }

    public static getInstance(): Database {
        if (!Database.instance) {
            Database.instance = new Database();
        }
        return Database.instance;
    }

    public async initialize(): Promise<void> {
        if (this.isInitialized) {
            logger.debug('Database already initialized');
            return;
        }

        try {
            await this.sequelize.authenticate();
            logger.info('Database connection established successfully');

            await this.sequelize.sync({ force: false, alter: false });
            logger.info('All models synchronized with database');

            this.isInitialized = true;
        } catch (error) {
            logger.error('Failed to connect to database', error);
            throw new Error('Failed to connect to database');
        }
    }

    public async ping(): Promise<string> {
        await this.sequelize.authenticate();
        return 'connected';
    }

    public getSequelize(): Sequelize {
        return this.sequelize;
    }

    public async close(): Promise<void> {
        await this.sequelize.close();
        this.isInitialized = false;
    }
}

export const database = Database.getInstance();
