import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import {
    AllowedRoots,
    CorralLogComponent,
    ErrorScope,
    PathGuard,
    ToolManager,
    createLogger,
    zodToIssues,
} from '@corral/core';
import type {
    CorralRuntimeError,
    Logger,
    SerializedError,
    ToolBundle,
    ToolDescriptor,
    ToolFactoryContext,
} from '@corral/core';
import { processToolsFactory } from '@corral/tools-process';
import { fileSystemToolsFactory } from '@corral/tools-filesystem';
import { ConfigError } from './config/errors.js';
import { isPlainObject } from './config/loader.js';
import type { SandboxConfig } from './config/schemas.js';
import { SandboxError } from './errors.js';
import {
    SANDBOX_OPERATIONS,
    SandboxRequestSchema,
    isSandboxOperation,
    type SandboxOperation,
} from './operations.js';

export type RequestId = string | number;

/**
 * Wire response. Every request gets exactly one, whatever went wrong.
 */
export type SandboxResponse =
    | { id?: RequestId; operation: string; ok: true; data: unknown }
    | { id?: RequestId; operation: string; ok: false; error: SerializedError };

export interface SandboxRuntimeOptions {
    /** Use this logger instead of building one from config. It is not destroyed on shutdown. */
    logger?: Logger;
    runtimeId?: string;
}

function idOf(request: unknown): RequestId | undefined {
    if (!isPlainObject(request)) {
        return undefined;
    }
    const { id } = request;
    return typeof id === 'string' || typeof id === 'number' ? id : undefined;
}

function operationOf(request: unknown): string {
    return isPlainObject(request) && typeof request.operation === 'string' ? request.operation : '';
}

/**
 * Assemble the sandbox from validated config: allowed roots, path guard,
 * both tool packages and the tool manager.
 *
 * @throws {CorralRuntimeError} when a root is missing or the scratch root cannot be created
 */
export async function createSandboxRuntime(
    config: SandboxConfig,
    options: SandboxRuntimeOptions = {}
): Promise<SandboxRuntime> {
    const ownsLogger = options.logger === undefined;
    const logger =
        options.logger ??
        createLogger({
            config: config.logger,
            runtimeId: options.runtimeId ?? `corral-${randomUUID().slice(0, 8)}`,
        });

    try {
        await fs.mkdir(config.scratchRoot, { recursive: true });
    } catch (error) {
        throw ConfigError.scratchRootUnavailable(
            config.scratchRoot,
            error instanceof Error ? error.message : String(error)
        );
    }

    const allowedRoots = await AllowedRoots.create([config.projectRoot, config.scratchRoot]);
    const context: ToolFactoryContext = {
        logger,
        pathGuard: new PathGuard(allowedRoots, logger),
        defaultDirectory: allowedRoots.list()[0] ?? config.projectRoot,
    };

    const bundles = [
        processToolsFactory.create(config.process, context),
        fileSystemToolsFactory.create(config.filesystem, context),
    ];
    const toolManager = new ToolManager(
        bundles.flatMap((bundle) => bundle.tools),
        logger
    );

    return new SandboxRuntime(toolManager, bundles, allowedRoots, logger, ownsLogger);
}

/**
 * Dispatches request envelopes to tools and owns their lifetime.
 * Requests may run concurrently; shutdown waits for those in flight.
 */
export class SandboxRuntime {
    private readonly logger: Logger;
    private readonly inFlight = new Set<Promise<SandboxResponse>>();
    private shutdownPromise: Promise<void> | undefined;

    constructor(
        private readonly toolManager: ToolManager,
        private readonly bundles: readonly ToolBundle[],
        readonly allowedRoots: AllowedRoots,
        private readonly rootLogger: Logger,
        private readonly ownsLogger: boolean
    ) {
        this.logger = rootLogger.createChild(CorralLogComponent.RUNTIME);

        const registered = toolManager.getToolIds();
        const missing = SANDBOX_OPERATIONS.filter((operation) => !registered.includes(operation));
        const unexpected = registered.filter((id) => !isSandboxOperation(id));
        if (missing.length > 0 || unexpected.length > 0) {
            throw SandboxError.operationTableMismatch(missing, unexpected);
        }

        this.logger.info(`Sandbox runtime ready (roots: ${allowedRoots.list().join(', ')})`);
    }

    get operations(): readonly SandboxOperation[] {
        return SANDBOX_OPERATIONS;
    }

    describeTools(): ToolDescriptor[] {
        return this.toolManager.describeTools();
    }

    /**
     * Run one request. Never rejects: every failure is an `ok: false` response.
     */
    async dispatch(request: unknown): Promise<SandboxResponse> {
        if (this.shutdownPromise) {
            return this.failure(idOf(request), operationOf(request), SandboxError.shutDown());
        }

        const pending = this.execute(request);
        this.inFlight.add(pending);
        try {
            return await pending;
        } finally {
            this.inFlight.delete(pending);
        }
    }

    /**
     * Parse one NDJSON line and dispatch it
     */
    async dispatchLine(line: string): Promise<SandboxResponse> {
        let request: unknown;
        try {
            request = JSON.parse(line);
        } catch (error) {
            return this.failure(
                undefined,
                '',
                SandboxError.malformedJson(error instanceof Error ? error.message : String(error))
            );
        }
        return this.dispatch(request);
    }

    /**
     * Stop accepting requests, wait for those in flight, then kill background
     * processes. Safe to call more than once.
     */
    shutdown(): Promise<void> {
        if (!this.shutdownPromise) {
            this.shutdownPromise = this.drainAndDispose();
        }
        return this.shutdownPromise;
    }

    private async execute(request: unknown): Promise<SandboxResponse> {
        const parsed = SandboxRequestSchema.safeParse(request);
        if (!parsed.success) {
            const issues = zodToIssues(parsed.error, 'error', ErrorScope.RUNTIME);
            this.logger.warn(`Rejected request envelope: ${parsed.error.message}`);
            return this.failure(idOf(request), operationOf(request), SandboxError.invalidRequest(issues));
        }

        const { id, operation, input } = parsed.data;
        this.logger.debug(`Dispatching ${operation}`, { requestId: id });

        const result = await this.toolManager.execute(operation, input, {
            requestId: id === undefined ? undefined : String(id),
        });

        if (result.ok) {
            return { ...(id !== undefined && { id }), operation, ok: true, data: result.data };
        }
        return { ...(id !== undefined && { id }), operation, ok: false, error: result.error };
    }

    private failure(
        id: RequestId | undefined,
        operation: string,
        error: CorralRuntimeError
    ): SandboxResponse {
        return { ...(id !== undefined && { id }), operation, ok: false, error: error.toJSON() };
    }

    private async drainAndDispose(): Promise<void> {
        if (this.inFlight.size > 0) {
            this.logger.info(`Waiting for ${this.inFlight.size} in-flight request(s)`);
            await Promise.allSettled(this.inFlight);
        }

        const results = await Promise.allSettled(
            this.bundles.map((bundle) => (bundle.dispose ? bundle.dispose() : Promise.resolve()))
        );
        for (const result of results) {
            if (result.status === 'rejected') {
                const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
                this.logger.error(`Failed to release tool resources: ${reason}`);
            }
        }

        this.logger.info('Sandbox runtime shut down');
        if (this.ownsLogger) {
            await this.rootLogger.destroy();
        }
    }
}
