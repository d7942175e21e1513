/**
 * Unit tests for operator alerts and the coordinator's concurrency primitives
 *
 * Tests cover:
 * - Alert formatting and SNS publishing
 * - Fan-out that tolerates a failing channel
 * - Bounded worker pool and per-key mutex
 */

import { Alert, AlertDispatcher, ConsoleAlertChannel, formatAlert, SnsAlertChannel } from '../src/alerts';
import { KeyedMutex, runWithConcurrency } from '../src/coordinator/concurrency';
import { RecordingAlertChannel } from './fakes';

const mockSend = jest.fn();

jest.mock('@aws-sdk/client-sns', () => ({
    SNSClient: jest.fn(() => ({ send: mockSend })),
    PublishCommand: jest.fn((input: unknown) => ({ command: 'Publish', input }))
}));

const ALERT: Alert = {
    severity: 'critical',
    symbol: 'AAPL',
    window: { start: Date.UTC(2024, 0, 5), end: Date.UTC(2024, 0, 6) },
    title: 'Window failed; symbol blocked',
    detail: 'attempt 5 transient-fetch: HTTP 503 from yahoo'
};

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>(r => {
        resolve = r;
    });
    return { promise, resolve };
}

describe('formatAlert', () => {
    it('should render severity, symbol, window and detail on one line', () => {
        expect(formatAlert(ALERT)).toBe(
            '[CRITICAL] Window failed; symbol blocked: AAPL [2024-01-05T00:00:00.000Z, 2024-01-06T00:00:00.000Z) - attempt 5 transient-fetch: HTTP 503 from yahoo'
        );
    });
});

describe('ConsoleAlertChannel', () => {
    it('should log the formatted alert as an error', async () => {
        const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

        await new ConsoleAlertChannel().send(ALERT);

        expect(spy).toHaveBeenCalledWith(formatAlert(ALERT));
        spy.mockRestore();
    });
});

describe('SnsAlertChannel', () => {
    beforeEach(() => {
        mockSend.mockReset();
    });

    it('should publish the alert as JSON with a short subject', async () => {
        mockSend.mockResolvedValueOnce({ MessageId: 'message-1' });
        const channel = new SnsAlertChannel('arn:aws:sns:us-west-2:123456789012:dev-stocklake-ingestion-alerts');

        await channel.send(ALERT);

        const { input } = mockSend.mock.calls[0][0];
        expect(input.TopicArn).toBe('arn:aws:sns:us-west-2:123456789012:dev-stocklake-ingestion-alerts');
        expect(input.Subject).toBe('StockLake critical: AAPL');
        expect(JSON.parse(input.Message)).toEqual({
            severity: 'critical',
            symbol: 'AAPL',
            window: { start: '2024-01-05T00:00:00.000Z', end: '2024-01-06T00:00:00.000Z' },
            title: 'Window failed; symbol blocked',
            detail: 'attempt 5 transient-fetch: HTTP 503 from yahoo'
        });
    });
});

describe('AlertDispatcher', () => {
    it('should deliver to every channel even when one fails', async () => {
        const failing = { send: jest.fn(async (): Promise<void> => { throw new Error('topic not found'); }) };
        const recording = new RecordingAlertChannel();
        const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

        await expect(new AlertDispatcher([failing, recording]).notify(ALERT)).resolves.toBeUndefined();

        expect(recording.alerts).toEqual([ALERT]);
        expect(spy).toHaveBeenCalledWith('Alert channel Object failed:', 'topic not found');
        spy.mockRestore();
    });
});

describe('runWithConcurrency', () => {
    it('should keep result order and never exceed the limit', async () => {
        let active = 0;
        let maxActive = 0;

        const results = await runWithConcurrency([30, 10, 20, 5, 15], 2, async (ms, index) => {
            active++;
            maxActive = Math.max(maxActive, active);
            await new Promise(resolve => setTimeout(resolve, ms));
            active--;
            return index * 10;
        });

        expect(results).toEqual([0, 10, 20, 30, 40]);
        expect(maxActive).toBe(2);
    });

    it('should return an empty list for no items', async () => {
        expect(await runWithConcurrency([], 4, async () => 1)).toEqual([]);
    });
});

describe('KeyedMutex', () => {
    it('should run tasks for the same key one at a time in arrival order', async () => {
        const mutex = new KeyedMutex();
        const order: string[] = [];
        const gate = deferred();

        const first = mutex.runExclusive('AAPL', async () => {
            order.push('first:start');
            await gate.promise;
            order.push('first:end');
        });
        const second = mutex.runExclusive('AAPL', async () => {
            order.push('second');
        });

        await new Promise(resolve => setImmediate(resolve));
        expect(mutex.isLocked('AAPL')).toBe(true);
        expect(order).toEqual(['first:start']);

        gate.resolve();
        await Promise.all([first, second]);

        expect(order).toEqual(['first:start', 'first:end', 'second']);
        expect(mutex.isLocked('AAPL')).toBe(false);
    });

    it('should not hold up other keys', async () => {
        const mutex = new KeyedMutex();
        const gate = deferred();

        const blocked = mutex.runExclusive('AAPL', () => gate.promise);
        const other = await mutex.runExclusive('MSFT', async () => 'done');

        expect(other).toBe('done');
        gate.resolve();
        await blocked;
    });

    it('should release the key when a task throws', async () => {
        const mutex = new KeyedMutex();

        await expect(mutex.runExclusive('AAPL', async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        expect(mutex.isLocked('AAPL')).toBe(false);
        expect(await mutex.runExclusive('AAPL', async () => 'next')).toBe('next');
    });
});
