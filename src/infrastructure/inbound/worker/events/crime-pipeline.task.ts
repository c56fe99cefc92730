// Configuration
import { type CrimePipelineTaskConfig } from '../../../../application/ports/inbound/configuration.port.js';

// Application
import { type TaskPort } from '../../../../application/ports/inbound/worker.port.js';
import { type IngestCrimeEventsUseCase } from '../../../../application/use-cases/events/ingest-crime-events.use-case.js';

import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

export class CrimePipelineTask implements TaskPort {
    public readonly executeOnStartup: boolean;
    public readonly name = 'crime-pipeline';
    public readonly schedule: string;

    constructor(
        private readonly ingestCrimeEvents: IngestCrimeEventsUseCase,
        private readonly taskConfig: CrimePipelineTaskConfig,
        private readonly logger: LoggerPort,
    ) {
        this.executeOnStartup = taskConfig.executeOnStartup;
        this.schedule = taskConfig.schedule;
    }

    async execute(): Promise<void> {
        this.logger.info('Crime pipeline task started', { feeds: this.taskConfig.feeds });

        try {
            const result = await this.ingestCrimeEvents.execute({
                feeds: this.taskConfig.feeds,
                maxItems: this.taskConfig.maxItems,
                since: new Date(this.taskConfig.since),
            });

            this.logger.info('Crime pipeline task finished', {
                itemsProcessed: result.itemsProcessed,
                itemsSaved: result.itemsSaved,
                renderingArtifact: result.renderingArtifact,
            });
        } catch (error) {
            this.logger.error('Crime pipeline encountered an error', { error });
            throw error;
        }
    }
}
