/**
 * @file Pushgateway Sink
 *
 * Pushes a whole metric batch to a Prometheus Pushgateway in one PUT, so the
 * job's group is replaced atomically. Any non-2xx answer or transport
 * failure rejects with a SinkError; the batch is not retried.
 *
 * @module telemetry/sinks/PushGatewaySink
 */

import http from 'http';
import https from 'https';
import { URL } from 'url';
import type { MetricBatch, TelemetrySink } from '../types.js';
import { exposition_render, EXPOSITION_CONTENT_TYPE } from './exposition.js';
import { SinkError } from '../../config/errors.js';

export interface PushGatewaySinkOptions {
    /** Gateway base URL; a bare `host:port` is taken as http. */
    gatewayUrl: string;
    job: string;
    timeoutMs?: number;
}

export class PushGatewaySink implements TelemetrySink<MetricBatch> {
    private readonly target: URL;
    private readonly timeoutMs: number;

    constructor(options: PushGatewaySinkOptions) {
        this.target = pushUrl_build(options.gatewayUrl, options.job);
        this.timeoutMs = options.timeoutMs ?? 10000;
    }

    /**
     * Full push endpoint, `<gateway>/metrics/job/<job>`.
     */
    get url(): string {
        return this.target.toString();
    }

    async publish(batch: MetricBatch): Promise<void> {
        const body: string = exposition_render(batch.samples);
        const status: number = await this.body_put(body);
        if (status < 200 || status >= 300) {
            throw new SinkError(`Pushgateway rejected push with HTTP ${status}`, status);
        }
    }

    private body_put(body: string): Promise<number> {
        const request: typeof http.request = this.target.protocol === 'https:' ? https.request : http.request;
        return new Promise(
            (resolve: (status: number) => void, reject: (reason: SinkError) => void): void => {
                const req: http.ClientRequest = request(this.target, {
                    method: 'PUT',
                    headers: {
                        'Content-Type': EXPOSITION_CONTENT_TYPE,
                        'Content-Length': Buffer.byteLength(body)
                    }
                }, (res: http.IncomingMessage): void => {
                    res.resume();
                    res.on('end', (): void => resolve(res.statusCode ?? 0));
                    res.on('error', (error: Error): void => reject(new SinkError(`Push response failed: ${error.message}`)));
                });

                req.setTimeout(this.timeoutMs, (): void => {
                    req.destroy(new Error(`timed out after ${this.timeoutMs}ms`));
                });
                req.on('error', (error: Error): void => {
                    reject(new SinkError(`Push to ${this.target.host} failed: ${error.message}`));
                });

                req.write(body);
                req.end();
            }
        );
    }
}

/**
 * Build the push endpoint from a gateway address and job name.
 */
export function pushUrl_build(gatewayUrl: string, job: string): URL {
    const base: string = /^[a-z][a-z0-9+.-]*:\/\//i.test(gatewayUrl) ? gatewayUrl : `http://${gatewayUrl}`;
    const url: URL = new URL(base);
    const prefix: string = url.pathname.replace(/\/+$/, '');
    url.pathname = `${prefix}/metrics/job/${encodeURIComponent(job)}`;
    return url;
}
