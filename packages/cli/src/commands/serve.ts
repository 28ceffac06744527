import * as readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { Logger } from '@corral/core';
import type { SandboxResponse, SandboxRuntime } from '@corral/runtime';

export interface ServeStreams {
    input: Readable;
    output: Writable;
}

/**
 * NDJSON loop: one request per input line, one response per output line.
 * Requests run concurrently, so responses may come back out of order; the
 * `id` field pairs them up. Resolves once input ends, every response is
 * written and the runtime has shut down. Aborting `signal` stops reading
 * the same way end of input does.
 */
export async function serve(
    runtime: SandboxRuntime,
    streams: ServeStreams,
    logger: Logger,
    signal?: AbortSignal
): Promise<void> {
    const lines = readline.createInterface({
        input: streams.input,
        crlfDelay: Infinity,
        terminal: false,
        ...(signal !== undefined && { signal }),
    });
    const inFlight = new Set<Promise<void>>();

    const write = (response: SandboxResponse): void => {
        try {
            streams.output.write(`${JSON.stringify(response)}\n`);
        } catch (error) {
            logger.error(
                `Failed to write response for ${response.operation}: ${error instanceof Error ? error.message : String(error)}`
            );
        }
    };

    logger.info('Serving requests on stdin');
    for await (const line of lines) {
        if (line.trim() === '') {
            continue;
        }
        const task: Promise<void> = runtime
            .dispatchLine(line)
            .then(write)
            .finally(() => {
                inFlight.delete(task);
            });
        inFlight.add(task);
    }

    logger.info(`Input closed; draining ${inFlight.size} request(s)`);
    await Promise.all(inFlight);
    await runtime.shutdown();
}
