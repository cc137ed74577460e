/**
 * Option schemas for the metric functions.
 * Validated with Zod; defaults follow the long-format forecast layout
 * (`unique_id`, `ds`, `y`, `cutoff`).
 */

import { z, type ZodError } from "zod";
import { InvalidOptionsError } from "./errors.ts";

// ============================================================================
// Column options
// ============================================================================

const ColumnName = z.string().min(1, "column name must not be empty");

export const ColumnOptionsSchema = z.object({
	idCol: ColumnName.default("unique_id"),
	targetCol: ColumnName.default("y"),
	cutoffCol: ColumnName.default("cutoff"),
});

export type ColumnOptions = z.infer<typeof ColumnOptionsSchema>;
export type ColumnOptionsInput = z.input<typeof ColumnOptionsSchema>;

export const ModelsSchema = z
	.array(ColumnName)
	.superRefine((models, ctx) => {
		const seen = new Set<string>();
		for (const [index, model] of models.entries()) {
			if (seen.has(model)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: [index],
					message: `duplicate model column "${model}"`,
				});
			}
			seen.add(model);
		}
	});

// ============================================================================
// evaluate() options
// ============================================================================

export const EvaluateOptionsSchema = ColumnOptionsSchema.extend({
	models: ModelsSchema.optional(),
	metrics: z.array(z.string().min(1)).min(1).default(["wape", "bias"]),
	timeCol: ColumnName.default("ds"),
});

export type EvaluateConfig = z.infer<typeof EvaluateOptionsSchema>;
export type EvaluateConfigInput = z.input<typeof EvaluateOptionsSchema>;

// ============================================================================
// Parsing helpers
// ============================================================================

function formatZodError(error: ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.join(".");
		return `${path ? `${path}: ` : ""}${issue.message}`;
	});
}

/**
 * Parse a value against a schema, turning Zod issues into an InvalidOptionsError.
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
	const result = schema.safeParse(input);
	if (!result.success) {
		throw new InvalidOptionsError(formatZodError(result.error));
	}
	return result.data;
}

export function parseColumnOptions(input: ColumnOptionsInput = {}): ColumnOptions {
	return parseOptions(ColumnOptionsSchema, input);
}

export function parseModels(models: readonly string[]): string[] {
	return parseOptions(z.object({ models: ModelsSchema }), { models }).models;
}
