/**
 * @file NDJSON Sink
 * Append-only stream of newline-delimited JSON objects. Writes are
 * fire-and-forget; there is no acknowledgement contract. A stream error
 * (a closed pipe on stdout) is reported and fails the next publish only.
 */

import type { TelemetrySink } from '../types.js';
import { SinkError } from '../../config/errors.js';

/** The part of a writable stream the sink needs. */
export interface LineStream {
    write(chunk: string): boolean;
    on?(event: 'error', listener: (error: Error) => void): unknown;
}

export type RecordMapper<T> = (batch: T) => readonly object[];

export type StreamErrorHandler = (error: Error) => void;

export class NdjsonSink<T> implements TelemetrySink<T> {
    private readonly records: RecordMapper<T>;
    private readonly stream: LineStream;
    private failure: Error | null = null;

    constructor(
        records: RecordMapper<T>,
        stream: LineStream = process.stdout,
        onError: StreamErrorHandler = (error: Error): void => console.error(`NDJSON output failed: ${error.message}`)
    ) {
        this.records = records;
        this.stream = stream;
        this.stream.on?.('error', (error: Error): void => {
            this.failure = error;
            onError(error);
        });
    }

    async publish(batch: T): Promise<void> {
        const failure: Error | null = this.failure;
        if (failure) {
            this.failure = null;
            throw new SinkError(`Output stream failed: ${failure.message}`);
        }
        for (const record of this.records(batch)) {
            this.record_write(record);
        }
    }

    /**
     * Write one record outside the batch flow (status and error lines).
     */
    record_write(record: object): void {
        this.stream.write(`${JSON.stringify(record)}\n`);
    }
}
