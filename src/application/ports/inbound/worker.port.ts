/**
 * Background job run on a cron schedule, such as one crime pipeline run
 */
export interface TaskPort {
    /**
     * One run of the job. A rejection is logged by the worker and does not stop later runs.
     */
    execute(): Promise<void>;

    /** Also run once as soon as the worker starts */
    readonly executeOnStartup: boolean;

    /** Identifies the task in logs; at most one run per name is in progress */
    readonly name: string;

    /** Five- or six-field cron expression */
    readonly schedule: string;
}

export interface WorkerPort {
    /**
     * Schedules every task and starts the startup runs without waiting for them.
     * Rejects when a schedule is not a valid cron expression.
     */
    initialize(): Promise<void>;

    /**
     * Cancels future occurrences and resolves once the runs in progress have settled
     */
    stop(): Promise<void>;
}
