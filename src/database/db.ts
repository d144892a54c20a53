import { MongoClient, type Collection, type Db, type Document } from 'mongodb';
import { createLogger } from '../logger.js';

const log = createLogger('MongoDB');

let client: MongoClient | null = null;
let db: Db | null = null;

export async function connectDB(uri: string, dbName: string): Promise<Db> {
    if (db) return db;

    client = new MongoClient(uri);
    await client.connect();
    db = client.db(dbName);
    log.info(`Connected to MongoDB database: ${dbName}`);
    return db;
}

export async function disconnectDB(): Promise<void> {
    if (client) {
        await client.close();
        client = null;
        db = null;
        log.info('Disconnected from MongoDB');
    }
}

export function getCollection<T extends Document>(name: string): Collection<T> {
    if (!db) {
        throw new Error('Database not connected. Call connectDB() first.');
    }
    return db.collection<T>(name);
}
