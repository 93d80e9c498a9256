import { z } from 'zod';
import { MAX_EPOCH_MS } from '@/core';
import type { AccelerationBatchV1, MsEpoch } from '@/core';

/**
 * Zod schemas for the wire payloads (snake_case, as sent by clients).
 * Parsing converts them into the core's camelCase model.
 */

// Date and time with no `Z` or offset, e.g. `2024-01-01T10:00:00.250`.
const NAIVE_DATETIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/** Date strings without an offset are UTC, whatever the host's time zone. */
export const parseTimestamp = (value: string): MsEpoch => {
    return Date.parse(NAIVE_DATETIME.test(value) ? `${value}Z` : value);
};

const toMsEpoch = (value: number | string): MsEpoch => {
    return typeof value === 'number' ? value : parseTimestamp(value);
};

const OUT_OF_RANGE = { message: 'Outside the representable date range' };

const TimestampSchema = z
    .union([
        z.number().finite().min(-MAX_EPOCH_MS, OUT_OF_RANGE).max(MAX_EPOCH_MS, OUT_OF_RANGE),
        z.string().refine(value => !Number.isNaN(parseTimestamp(value)), { message: 'Invalid datetime' })
    ])
    .transform(toMsEpoch);

const AccelerationSampleSchema = z.object({
    timestamp: TimestampSchema,
    x: z.number().finite(),
    y: z.number().finite(),
    z: z.number().finite()
});

export const AccelerationDataSchema = z
    .object({
        data_type: z.string(),
        device_info: z.record(z.unknown()),
        sampling_rate_hz: z.number().positive(),
        start_time: TimestampSchema,
        samples: z.array(AccelerationSampleSchema),
        metadata: z.record(z.unknown()).nullish(),
        id: z.string().nullish()
    })
    .transform((data): AccelerationBatchV1 => ({
        dataType: data.data_type,
        deviceInfo: data.device_info,
        samplingRateHz: data.sampling_rate_hz,
        startTime: data.start_time,
        samples: data.samples,
        ...(data.metadata ? { metadata: data.metadata } : {}),
        ...(data.id ? { id: data.id } : {})
    }));

export const ActivityRequestSchema = z
    .object({
        acceleration_data: AccelerationDataSchema,
        include_metrics: z.boolean().default(true),
        include_patterns: z.boolean().default(true),
        user_id: z.string().min(1)
    })
    .transform(request => ({
        batch: request.acceleration_data,
        includeMetrics: request.include_metrics,
        includePatterns: request.include_patterns,
        userId: request.user_id
    }));

export type ActivityRequestV1 = z.output<typeof ActivityRequestSchema>;

export type ValidationResult<T> =
    | { success: true; data: T }
    | { success: false; errors: string[] };

const formatIssues = (error: z.ZodError): string[] => {
    return error.errors.map(err => {
        const path = err.path.join('.');
        return `${path}: ${err.message}`;
    });
};

/**
 * Validate a recognize request and return detailed error messages
 */
export function validateActivityRequest(payload: unknown): ValidationResult<ActivityRequestV1> {
    const result = ActivityRequestSchema.safeParse(payload);
    if (result.success) {
        return { success: true, data: result.data };
    }
    return { success: false, errors: formatIssues(result.error) };
}

export function validateAccelerationData(payload: unknown): ValidationResult<AccelerationBatchV1> {
    const result = AccelerationDataSchema.safeParse(payload);
    if (result.success) {
        return { success: true, data: result.data };
    }
    return { success: false, errors: formatIssues(result.error) };
}
