import { logger } from './logger.js';

/**
 * Campaign Dispatcher - Simple Metrics Collector
 *
 * Process-lifetime counters, logged after each cycle. Quotas never read these;
 * they are always re-derived from the ledger.
 */

interface DispatchMetrics {
    cyclesRun: number;
    outreachSent: number;
    fillerSent: number;
    sendFailures: number;
    transportRetries: number;
    recipientsRejected: number;
    startTime: number;
}

type Counter = keyof Omit<DispatchMetrics, 'startTime'>;

class MetricsService {
    private metrics: DispatchMetrics = MetricsService.empty();

    private static empty(): DispatchMetrics {
        return {
            cyclesRun: 0,
            outreachSent: 0,
            fillerSent: 0,
            sendFailures: 0,
            transportRetries: 0,
            recipientsRejected: 0,
            startTime: Date.now(),
        };
    }

    increment(metric: Counter, amount: number = 1) {
        this.metrics[metric] += amount;
    }

    get(metric: Counter): number {
        return this.metrics[metric];
    }

    reset() {
        this.metrics = MetricsService.empty();
    }

    getSummary() {
        const uptimeSeconds = Math.floor((Date.now() - this.metrics.startTime) / 1000);
        return {
            ...this.metrics,
            uptimeSeconds,
            successRate: this.calculateSuccessRate(),
        };
    }

    private calculateSuccessRate(): string {
        const sent = this.metrics.outreachSent + this.metrics.fillerSent;
        const totalAttempts = sent + this.metrics.sendFailures;
        if (totalAttempts === 0) return '0%';
        return `${((sent / totalAttempts) * 100).toFixed(1)}%`;
    }

    logMetricsSummary() {
        logger.info('📊 Dispatch Metrics Summary', { metadata: this.getSummary() });
    }
}

export const metrics = new MetricsService();
export default metrics;
