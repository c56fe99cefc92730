import cron, { type ScheduledTask } from 'node-cron';

import { type TaskPort, type WorkerPort } from '../../../application/ports/inbound/worker.port.js';

import { type LoggerPort } from '../../../shared/logger/logger.port.js';

export class NodeCronAdapter implements WorkerPort {
    private readonly runningTasks = new Map<string, Promise<void>>();
    private readonly scheduledTasks: ScheduledTask[] = [];

    constructor(
        private readonly logger: LoggerPort,
        private readonly tasks: TaskPort[],
    ) {}

    async initialize(): Promise<void> {
        this.logger.debug('Starting worker', { tasks: this.tasks.length });

        for (const task of this.tasks) {
            this.scheduleTask(task);
        }

        this.logger.debug('Worker initialization complete');
    }

    async stop(): Promise<void> {
        this.logger.info('Stopping worker', { scheduledTasks: this.scheduledTasks.length });

        for (const task of this.scheduledTasks) {
            task.stop();
        }

        this.scheduledTasks.length = 0;

        if (this.runningTasks.size > 0) {
            this.logger.info('Waiting for running tasks', { tasks: [...this.runningTasks.keys()] });
            await Promise.all(this.runningTasks.values());
        }

        this.logger.info('Worker has stopped');
    }

    /**
     * Runs the task unless its previous run is still going
     */
    private executeSafely(task: TaskPort): Promise<void> {
        const running = this.runningTasks.get(task.name);
        if (running) {
            this.logger.warn('Task still running, skipping this occurrence', { task: task.name });
            return running;
        }

        const run = this.run(task).finally(() => {
            this.runningTasks.delete(task.name);
        });
        this.runningTasks.set(task.name, run);

        return run;
    }

    private async run(task: TaskPort): Promise<void> {
        const start = Date.now();
        this.logger.debug('Task started', { task: task.name });

        try {
            await task.execute();
            this.logger.info('Task completed successfully', {
                durationMs: Date.now() - start,
                task: task.name,
            });
        } catch (error) {
            this.logger.error('Task execution error', { error, task: task.name });
        }
    }

    private scheduleTask(task: TaskPort): void {
        if (!cron.validate(task.schedule)) {
            throw new Error(`Invalid schedule "${task.schedule}" for task ${task.name}`);
        }

        this.logger.debug('Scheduling task', { schedule: task.schedule, task: task.name });

        const cronTask = cron.schedule(task.schedule, () => {
            void this.executeSafely(task);
        });

        this.scheduledTasks.push(cronTask);

        if (task.executeOnStartup) {
            this.logger.debug('Executing startup task', { task: task.name });
            void this.executeSafely(task);
        }
    }
}
