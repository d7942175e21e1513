/**
 * Lambda handler for stock data ingestion
 *
 * Event structure:
 * - Scheduled tick: {} , { action: 'tick' } or an EventBridge scheduled event
 * - Backfill: { action: 'backfill', symbol: 'AAPL', until?: '2024-06-30' }
 * - Status: { action: 'status' }
 * - Blocked window resolution: { action: 'retry-failed' | 'skip-failed', symbol: 'AAPL' }
 *
 * Cycle failures are reported in the result, never thrown to the runtime.
 */

import { Coordinator } from './src/coordinator/coordinator';
import { getErrorMessage } from './src/errors';
import { StockIngestionService } from './src/service';
import { BackfillResult, RunRecord, SymbolStatus, TickSummary, WatermarkRecord } from './src/types';
import { parseInstant } from './src/utils/time';

export type IngestionCommand =
    | { action: 'tick' }
    | { action: 'backfill'; symbol: string; until: number | null }
    | { action: 'status' }
    | { action: 'retry-failed'; symbol: string }
    | { action: 'skip-failed'; symbol: string };

export interface HandlerResult {
    success: boolean;
    action: string;
    errors: string[];
    tick?: TickSummary;
    backfill?: BackfillResult;
    status?: SymbolStatus[];
    run?: RunRecord;
    watermark?: WatermarkRecord;
}

/**
 * The part of the Lambda context the handler uses
 */
export interface LambdaContext {
    getRemainingTimeInMillis(): number;
}

export interface HandlerDeps {
    coordinator: Coordinator;
    cancelMarginMs: number;
}

function symbolOf(event: object, action: string): string {
    if (!('symbol' in event) || typeof event.symbol !== 'string' || event.symbol === '') {
        throw new Error(`Action '${action}' requires a symbol`);
    }
    return event.symbol;
}

/**
 * Turn an invocation payload into a command. Anything without an action,
 * including EventBridge scheduled events, is a tick.
 */
export function parseEvent(event: unknown): IngestionCommand {
    if (typeof event !== 'object' || event === null || !('action' in event) || event.action === undefined) {
        return { action: 'tick' };
    }

    switch (event.action) {
        case 'tick':
            return { action: 'tick' };
        case 'status':
            return { action: 'status' };
        case 'backfill': {
            const symbol = symbolOf(event, 'backfill');
            if (!('until' in event) || event.until === undefined || event.until === null) {
                return { action: 'backfill', symbol, until: null };
            }
            const until = typeof event.until === 'string' ? parseInstant(event.until) : null;
            if (until === null) {
                throw new Error(`Invalid until date: ${JSON.stringify(event.until)}`);
            }
            return { action: 'backfill', symbol, until };
        }
        case 'retry-failed':
            return { action: 'retry-failed', symbol: symbolOf(event, 'retry-failed') };
        case 'skip-failed':
            return { action: 'skip-failed', symbol: symbolOf(event, 'skip-failed') };
        default:
            throw new Error(`Unknown action: ${String(event.action)}`);
    }
}

async function execute(coordinator: Coordinator, command: IngestionCommand, signal: AbortSignal): Promise<HandlerResult> {
    switch (command.action) {
        case 'tick': {
            const tick = await coordinator.tick(Date.now(), { signal });
            const errors = [
                ...tick.errors,
                ...tick.runs
                    .filter(run => run.status === 'failed')
                    .map(run => `${run.symbol} ${new Date(run.window.start).toISOString()}: ${run.errorMessage ?? run.status}`)
            ];
            return { success: errors.length === 0, action: command.action, errors, tick };
        }
        case 'backfill': {
            const backfill = await coordinator.backfill(command.symbol, command.until ?? Date.now(), { signal });
            return { success: backfill.completed, action: command.action, errors: backfill.errors, backfill };
        }
        case 'status': {
            const status = await coordinator.status();
            return { success: true, action: command.action, errors: [], status };
        }
        case 'retry-failed': {
            const run = await coordinator.retryFailedWindow(command.symbol, { signal });
            const committed = run.status === 'success' || run.status === 'partial';
            return { success: committed, action: command.action, errors: committed ? [] : [run.errorMessage ?? run.status], run };
        }
        case 'skip-failed': {
            const watermark = await coordinator.skipFailedWindow(command.symbol);
            return { success: true, action: command.action, errors: [], watermark };
        }
    }
}

/**
 * Build a handler around a coordinator source. The deadline for in-flight
 * cycles is the invocation's remaining time minus cancelMarginMs.
 */
export function createHandler(resolveDeps: () => Promise<HandlerDeps>) {
    return async (event: unknown, context?: LambdaContext): Promise<HandlerResult> => {
        console.log('Stock ingestion Lambda invoked');
        console.log('Event:', JSON.stringify(event, null, 2));

        let action = 'unknown';
        const controller = new AbortController();
        let deadline: NodeJS.Timeout | undefined;

        try {
            const command = parseEvent(event);
            action = command.action;

            const { coordinator, cancelMarginMs } = await resolveDeps();
            if (context) {
                const budget = Math.max(0, context.getRemainingTimeInMillis() - cancelMarginMs);
                deadline = setTimeout(() => {
                    console.warn(`Deadline reached after ${budget}ms; cancelling in-flight cycles`);
                    controller.abort();
                }, budget);
            }

            const result = await execute(coordinator, command, controller.signal);

            if (result.success) {
                console.log(`Action '${action}' completed successfully`);
            } else {
                console.error(`Action '${action}' finished with errors:`, result.errors);
            }
            return result;

        } catch (error) {
            const errorMessage = getErrorMessage(error);
            console.error('Lambda handler error:', {
                message: errorMessage,
                stack: error instanceof Error ? error.stack : undefined,
                event: JSON.stringify(event)
            });

            return {
                success: false,
                action,
                errors: [`Lambda handler error: ${errorMessage}`]
            };
        } finally {
            if (deadline) {
                clearTimeout(deadline);
            }
        }
    };
}

let service: StockIngestionService | null = null;

function getService(): StockIngestionService {
    if (!service) {
        service = new StockIngestionService();
    }
    return service;
}

export const handler = createHandler(async () => {
    const current = getService();
    return { coordinator: await current.getCoordinator(), cancelMarginMs: current.cancelMarginMs };
});
