export const clamp01 = (value: number): number => {
    return Math.min(1, Math.max(0, value));
};

export const round = (value: number, digits: number): number => {
    return Number(value.toFixed(digits));
};

/**
 * Arithmetic mean; 0 for an empty series.
 */
export const getMean = (values: number[]): number => {
    if (values.length === 0) return 0;
    return values.reduce((acc, v) => acc + v, 0) / values.length;
};

/**
 * Population variance (divides by N, not N - 1).
 */
export const getVariance = (values: number[]): number => {
    if (values.length === 0) return 0;
    const mean = getMean(values);
    const squaredDiffSum = values.reduce((acc, v) => acc + (v - mean) * (v - mean), 0);
    return squaredDiffSum / values.length;
};

export const getStdDev = (values: number[]): number => {
    return Math.sqrt(getVariance(values));
};

/**
 * Splits a series into consecutive chunks of `size`; the last chunk may be shorter.
 */
export const chunk = <T>(values: T[], size: number): T[][] => {
    const step = Math.max(1, Math.floor(size));
    const chunks: T[][] = [];
    for (let i = 0; i < values.length; i += step) {
        chunks.push(values.slice(i, i + step));
    }
    return chunks;
};
