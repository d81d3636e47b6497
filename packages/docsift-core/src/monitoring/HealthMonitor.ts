/**
 * System Health Monitor
 *
 * Checks each singleton of a started application and rolls the results up:
 * unhealthy when any check failed or any component is unhealthy, degraded
 * when any component is degraded or disabled, healthy otherwise.
 */

import { describeError } from '@docsift/async-utils';
import type { Logger } from '../logging/Logger.js';
import { EXTENSION_POINTS } from '../plugin-engine/capabilities.js';
import type { Singletons } from '../plugin-engine/types.js';
import { DurableTaskQueue } from '../tasks/DurableTaskQueue.js';

export type ComponentStatus = 'healthy' | 'degraded' | 'unhealthy' | 'disabled';

export type OverallStatus = 'healthy' | 'degraded' | 'unhealthy';

export type HealthDetail = string | number | boolean;

export interface ComponentHealth {
    status: ComponentStatus;
    details: Record<string, HealthDetail>;
}

export interface SystemHealthReport {
    status: OverallStatus;
    /** ISO timestamp of the check */
    timestamp: string;
    components: Record<string, ComponentHealth>;
    metrics: Record<string, number>;
    errors: string[];
}

export type HealthReportFormat = 'text' | 'json';

/** Backends that can answer a liveness check */
interface Pingable {
    health?(): Promise<boolean>;
}

export class SystemHealthMonitor {
    constructor(
        private readonly logger: Logger,
        private readonly now: () => Date = () => new Date()
    ) {}

    async checkSystemHealth(singletons: Singletons): Promise<SystemHealthReport> {
        const report: SystemHealthReport = {
            status: 'healthy',
            timestamp: this.now().toISOString(),
            components: {},
            metrics: {},
            errors: [],
        };

        await this.checkAll(report, [
            [
                'configuration',
                async () => ({
                    status: 'healthy',
                    details: { keys: Object.keys(singletons.configuration.toJSON()).length },
                }),
            ],
            ['plugins', async () => this.checkPlugins(singletons, report)],
            ['task_queue', () => this.checkTaskQueue(singletons)],
            ['cache', () => this.checkBackend(singletons.cache)],
            ['state_storage', () => this.checkBackend(singletons.stateStorage)],
            ['data_storage', () => this.checkBackend(singletons.dataStorage)],
        ]);

        report.status = overallStatus(report);
        if (report.status !== 'healthy') {
            this.logger.warn(`System health is ${report.status}`);
        }
        return report;
    }

    private async checkAll(
        report: SystemHealthReport,
        checks: Array<[string, () => Promise<ComponentHealth>]>
    ): Promise<void> {
        for (const [name, run] of checks) {
            await this.check(report, name, run);
        }
    }

    private async check(report: SystemHealthReport, name: string, run: () => Promise<ComponentHealth>): Promise<void> {
        try {
            report.components[name] = await run();
        } catch (error) {
            const message = describeError(error);
            this.logger.error(`Health check of ${name} failed: ${message}`);
            report.components[name] = { status: 'unhealthy', details: { error: message } };
            report.errors.push(`${name} check failed: ${message}`);
        }
    }

    private checkPlugins(singletons: Singletons, report: SystemHealthReport): ComponentHealth {
        const details: Record<string, HealthDetail> = {};
        let total = 0;
        for (const point of EXTENSION_POINTS) {
            const count = singletons.registry.getRegistrations(point).length;
            details[point] = count;
            total += count;
        }
        report.metrics.total_registrations = total;
        return { status: 'healthy', details };
    }

    private async checkTaskQueue(singletons: Singletons): Promise<ComponentHealth> {
        const queue = singletons.taskQueue;
        if (!queue) {
            return { status: 'disabled', details: { mode: 'synchronous' } };
        }
        const details: Record<string, HealthDetail> = { mode: queue.mode, type: queue.constructor.name };
        if (!(await answers(queue))) {
            return { status: 'unhealthy', details: { ...details, error: 'no answer from the queue backend' } };
        }
        if (!(queue instanceof DurableTaskQueue)) {
            return { status: 'healthy', details };
        }
        const stats = await queue.store.stats();
        // Dead letters need an operator
        return {
            status: stats.failed > 0 ? 'degraded' : 'healthy',
            details: { ...details, pending: stats.pending, processing: stats.processing, failed: stats.failed },
        };
    }

    private async checkBackend(backend: Pingable): Promise<ComponentHealth> {
        const details: Record<string, HealthDetail> = { type: backend.constructor.name };
        if (!(await answers(backend))) {
            return { status: 'unhealthy', details: { ...details, error: 'no answer from the backend' } };
        }
        return { status: 'healthy', details };
    }
}

async function answers(backend: Pingable): Promise<boolean> {
    return backend.health ? backend.health() : true;
}

function overallStatus(report: SystemHealthReport): OverallStatus {
    const statuses = Object.values(report.components).map(component => component.status);
    if (report.errors.length > 0 || statuses.includes('unhealthy')) {
        return 'unhealthy';
    }
    if (statuses.includes('degraded') || statuses.includes('disabled')) {
        return 'degraded';
    }
    return 'healthy';
}

export function formatHealthReport(report: SystemHealthReport, format: HealthReportFormat = 'text'): string {
    if (format === 'json') {
        return JSON.stringify(report, null, 2);
    }

    const lines = ['docsift system health', `Status: ${report.status.toUpperCase()}`, `Timestamp: ${report.timestamp}`, ''];
    if (report.errors.length > 0) {
        lines.push('ERRORS:', ...report.errors.map(error => `  - ${error}`), '');
    }
    lines.push('COMPONENTS:');
    for (const [name, component] of Object.entries(report.components)) {
        lines.push(`  ${name}: ${component.status.toUpperCase()}`);
        for (const [key, value] of Object.entries(component.details)) {
            lines.push(`    ${key}: ${value}`);
        }
    }
    const metrics = Object.entries(report.metrics);
    if (metrics.length > 0) {
        lines.push('', 'METRICS:', ...metrics.map(([key, value]) => `  ${key}: ${value}`));
    }
    return lines.join('\n');
}
