import { Db, MongoClient } from 'mongodb';

import logger from './logger.js';
import settings from './settings.js';

let client: MongoClient | null = null;

interface MongoHandle {
    db: Db | null;
    init(): Promise<Db>;
    close(): Promise<void>;
}

export const mongo: MongoHandle = {
    db: null,

    init: async (): Promise<Db> => {
        client = new MongoClient(settings.mongoUrl, {});
        await client.connect();
        const db = client.db(settings.mongoDb);
        mongo.db = db;
        logger.info(`Connected to ${settings.mongoUrl}/${db.databaseName}`);

        await db.collection('vaults').createIndex({ farmId: 1, account: 1 }, { unique: true });
        return db;
    },

    close: async (): Promise<void> => {
        if (!client) return;
        await client.close();
        client = null;
        mongo.db = null;
        logger.info('MongoDB connection closed');
    },
};

export default mongo;
