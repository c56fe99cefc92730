export interface ServerConfiguration {
    host: string;
    port: number;
}

/**
 * HTTP server port - exposes the stored events to clients
 */
export interface ServerPort {
    /**
     * Dispatch a request without opening a socket
     */
    request(
        path: string,
        options?: { body?: object | string; headers?: Record<string, string>; method?: string },
    ): Promise<Response>;

    start(config: ServerConfiguration): Promise<void>;

    stop(): Promise<void>;
}
