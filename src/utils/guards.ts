export type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

export const roundTo = (value: number, decimals: number = 2): number => {
    const factor = 10 ** decimals;
    return Math.round(value * factor) / factor;
};
