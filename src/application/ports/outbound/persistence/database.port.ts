/**
 * Database lifecycle
 */
export interface DatabasePort {
    /**
     * Open the database and create its schema when missing
     */
    initialize(): Promise<void>;

    close(): Promise<void>;
}
