import { z } from 'zod';

/**
 * Runtime settings read from environment variables. Classifier thresholds are
 * not here: they are fixed in the analysis config.
 */
const SettingsSchema = z.object({
    SERVICE_NAME: z.string().min(1).default('activity-recognition'),
    SERVICE_VERSION: z.string().min(1).default('0.1.0'),
    // Intensity above which a sample counts toward active minutes.
    ACTIVITY_DETECTION_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3)
});

export interface Settings {
    serviceName: string;
    version: string;
    activityDetectionThreshold: number;
}

export const loadSettings = (env: Record<string, string | undefined> = process.env): Settings => {
    const result = SettingsSchema.safeParse(env);

    if (!result.success) {
        const errors = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`);
        throw new Error(`Invalid settings: ${errors.join('; ')}`);
    }

    return {
        serviceName: result.data.SERVICE_NAME,
        version: result.data.SERVICE_VERSION,
        activityDetectionThreshold: result.data.ACTIVITY_DETECTION_THRESHOLD
    };
};
