import { z } from 'zod/v4';

// Application
import { type EventRepositoryPort } from '../../../../application/ports/outbound/persistence/event-repository.port.js';

// Domain
import { type CrimeEvent } from '../../../../domain/entities/crime-event.entity.js';

import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

import { type SqliteDatabase } from '../sqlite.database.js';

import { crimeEventRowSchema, EventMapper } from './sqlite-event.mapper.js';

const countRowSchema = z.object({ total: z.number().int() });

export class SqliteEventRepository implements EventRepositoryPort {
    private readonly mapper = new EventMapper();

    constructor(
        private readonly database: SqliteDatabase,
        private readonly logger: LoggerPort,
    ) {}

    async count(): Promise<number> {
        const row = this.database
            .getConnection()
            .prepare('SELECT COUNT(*) AS total FROM crime_events')
            .get();

        return countRowSchema.parse(row).total;
    }

    async findAll(): Promise<CrimeEvent[]> {
        const rows = this.database
            .getConnection()
            .prepare(
                `SELECT link, title, published_at, language, score, latitude, longitude, place_label, ingested_at
                 FROM crime_events
                 ORDER BY id`,
            )
            .all();

        return rows.map((row) => this.mapper.toDomain(crimeEventRowSchema.parse(row)));
    }

    async insertIfNew(event: CrimeEvent): Promise<boolean> {
        const result = this.database
            .getConnection()
            .prepare(
                `INSERT OR IGNORE INTO crime_events
                    (link, title, published_at, language, score, latitude, longitude, place_label, ingested_at)
                 VALUES
                    (@link, @title, @published_at, @language, @score, @latitude, @longitude, @place_label, @ingested_at)`,
            )
            .run(this.mapper.toRow(event));

        const inserted = result.changes > 0;
        if (!inserted) {
            this.logger.debug('Crime event already stored', { link: event.link });
        }

        return inserted;
    }
}
