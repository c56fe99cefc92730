// Domain
import {
    aggregateByBucket,
    type AggregatedPoint,
} from '../../../domain/services/spatial-aggregator.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Ports
import { type EventRepositoryPort } from '../../ports/outbound/persistence/event-repository.port.js';

export interface AggregateEventDensityOptions {
    /**
     * Drop buckets holding fewer events
     */
    minCount?: number;
}

/**
 * Use case folding every stored event into grid-cell counts
 */
export class AggregateEventDensityUseCase {
    constructor(
        private readonly eventRepository: EventRepositoryPort,
        private readonly logger: LoggerPort,
    ) {}

    public async execute(options: AggregateEventDensityOptions = {}): Promise<AggregatedPoint[]> {
        const events = await this.eventRepository.findAll();
        const points = aggregateByBucket(events);
        const minCount = options.minCount ?? 1;
        const filtered = points.filter((point) => point.count >= minCount);

        this.logger.debug('Event density aggregated', {
            buckets: filtered.length,
            events: events.length,
            minCount,
        });

        return filtered;
    }
}
