import Database from 'better-sqlite3';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

// Application
import { DatabaseInitializationError } from '../../../application/errors/pipeline.errors.js';
import { type DatabasePort } from '../../../application/ports/outbound/persistence/database.port.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

const IN_MEMORY = ':memory:';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS crime_events (
    id INTEGER PRIMARY KEY,
    link TEXT NOT NULL UNIQUE,
    title TEXT NOT NULL,
    published_at TEXT NOT NULL,
    language TEXT NOT NULL,
    score REAL NOT NULL,
    latitude REAL NOT NULL,
    longitude REAL NOT NULL,
    place_label TEXT NOT NULL,
    ingested_at TEXT NOT NULL
)`;

export class SqliteDatabase implements DatabasePort {
    private connection: Database.Database | null = null;

    constructor(
        private readonly logger: LoggerPort,
        private readonly databasePath: string,
    ) {}

    async close(): Promise<void> {
        this.connection?.close();
        this.connection = null;
    }

    getConnection(): Database.Database {
        if (!this.connection) {
            throw new Error('Database is not initialized');
        }
        return this.connection;
    }

    async initialize(): Promise<void> {
        if (this.connection) {
            return;
        }

        this.logger.info('Opening SQLite database', { databasePath: this.databasePath });

        try {
            if (this.databasePath !== IN_MEMORY) {
                await mkdir(dirname(this.databasePath), { recursive: true });
            }
            const connection = new Database(this.databasePath);
            connection.pragma('journal_mode = WAL');
            connection.exec(SCHEMA);
            this.connection = connection;
        } catch (error) {
            throw new DatabaseInitializationError(
                `Could not initialize the database at ${this.databasePath}`,
                { cause: error },
            );
        }
    }
}
