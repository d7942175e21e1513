/**
 * Operator alerts for windows that failed permanently or exhausted their retries
 */

import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';
import { getErrorMessage } from './errors';
import { FetchWindow } from './types';
import { formatWindow } from './utils/time';

export type AlertSeverity = 'warning' | 'critical';

export interface Alert {
    severity: AlertSeverity;
    symbol: string;
    window: FetchWindow;
    title: string;
    detail: string;
}

export interface AlertChannel {
    send(alert: Alert): Promise<void>;
}

export function formatAlert(alert: Alert): string {
    return `[${alert.severity.toUpperCase()}] ${alert.title}: ${alert.symbol} ${formatWindow(alert.window)} - ${alert.detail}`;
}

export class ConsoleAlertChannel implements AlertChannel {
    async send(alert: Alert): Promise<void> {
        console.error(formatAlert(alert));
    }
}

export class SnsAlertChannel implements AlertChannel {
    private readonly client: SNSClient;

    constructor(private readonly topicArn: string, region?: string, client?: SNSClient) {
        this.client = client ?? new SNSClient({ region: region || 'us-west-2' });
    }

    async send(alert: Alert): Promise<void> {
        await this.client.send(new PublishCommand({
            TopicArn: this.topicArn,
            Subject: `StockLake ${alert.severity}: ${alert.symbol}`.slice(0, 100),
            Message: JSON.stringify({
                ...alert,
                window: { start: new Date(alert.window.start).toISOString(), end: new Date(alert.window.end).toISOString() }
            }, null, 2)
        }));
    }
}

/**
 * Fan an alert out to every channel. A channel that fails is logged; it never fails the caller.
 */
export class AlertDispatcher {
    constructor(private readonly channels: AlertChannel[]) { }

    async notify(alert: Alert): Promise<void> {
        const results = await Promise.allSettled(this.channels.map(channel => channel.send(alert)));

        results.forEach((result, i) => {
            if (result.status === 'rejected') {
                console.error(`Alert channel ${this.channels[i].constructor.name} failed:`, getErrorMessage(result.reason));
            }
        });
    }
}
