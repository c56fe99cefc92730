import { type CrimeEvent } from '../../../../domain/entities/crime-event.entity.js';

/**
 * Repository port for crime event persistence, keyed by article link
 */
export interface EventRepositoryPort {
    count(): Promise<number>;

    /**
     * Every stored event, oldest insertion first
     */
    findAll(): Promise<CrimeEvent[]>;

    /**
     * Store the event unless one with the same link exists.
     * Resolves to false, without touching the stored row, when the link is already known.
     */
    insertIfNew(event: CrimeEvent): Promise<boolean>;
}
