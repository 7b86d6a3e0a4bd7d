/**
 * Pipeline Validation Schemas
 *
 * Zod schemas for the pipeline configuration, the product-code input and the JSON files
 * read by the command-line entry point (signal fixtures, internal data, prior run reports).
 */

import { z } from 'zod';

export const commonSchemas = {
    nonEmptyString: z.string().trim().min(1, 'String cannot be empty'),
    nonNegativeNumber: z.number().min(0, 'Must be 0 or greater'),
    positiveInt: z.number().int('Must be an integer').positive('Must be greater than 0'),
};

export const retryPolicySchema = z.object({
    maxAttempts: z.number().int().min(0, 'maxAttempts must be 0 or greater'),
    initialDelay: commonSchemas.nonNegativeNumber,
    maxDelay: commonSchemas.nonNegativeNumber,
    multiplier: z.number().min(1, 'multiplier must be at least 1'),
});

export const pipelineConfigSchema = z
    .object({
        batchCount: commonSchemas.positiveInt,
        alertThresholdPercent: commonSchemas.nonNegativeNumber,
        highSeverityThresholdPercent: commonSchemas.nonNegativeNumber,
        defaultMarketFactor: z.number().positive('Must be greater than 0'),
        growthMarketFactor: z.number().positive('Must be greater than 0'),
        periodLengthDays: commonSchemas.positiveInt,
        inventoryFloor: commonSchemas.nonNegativeNumber,
        insightTopN: commonSchemas.positiveInt,
        maxInsights: commonSchemas.positiveInt,
        defaultInsightConfidence: z.number().min(0).max(1),
        fetchTimeoutMs: z.number().int().min(0),
        queryTimeoutMs: z.number().int().min(0),
        retry: retryPolicySchema,
    })
    .refine(config => config.highSeverityThresholdPercent >= config.alertThresholdPercent, {
        message: 'highSeverityThresholdPercent cannot be lower than alertThresholdPercent',
        path: ['highSeverityThresholdPercent'],
    });

export const productCodesSchema = z.array(commonSchemas.nonEmptyString);

/**
 * Signal fixture entries; timestamps are ISO strings on disk
 */
export const rawDocumentSchema = z.object({
    source: z.string(),
    content: z.string(),
    publishedAt: z.coerce.date(),
    category: z.string().default('uncategorized'),
});

export const rawDocumentListSchema = z.array(rawDocumentSchema);

export const internalProductDataSchema = z.object({
    historicalSales: z.array(z.number().min(0)),
    inventoryLevel: z.number().min(0),
    productionPlans: z.array(z.number().min(0)).default([]),
});

/**
 * Internal data fixture keyed by product code
 */
export const internalDataFileSchema = z.record(z.string(), internalProductDataSchema);

/**
 * Subset of a written run report needed to use it as the baseline of the next run
 */
export const runReportSchema = z.object({
    runId: z.string(),
    status: z.enum(['completed', 'completedWithOmissions', 'failed']),
    generatedAt: z.coerce.date(),
    aggregatedForecasts: z.object({
        forecasts: z.array(
            z.object({
                productCode: z.string(),
                forecastUnits: z.number(),
            })
        ),
    }),
});

export type RunReportSnapshot = z.infer<typeof runReportSchema>;

/**
 * Flatten zod issues into `path: message` lines
 */
export function formatIssues(error: z.ZodError, prefix?: string): string[] {
    return error.issues.map(issue => {
        const path = [prefix, ...issue.path.map(String)].filter(Boolean).join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}
