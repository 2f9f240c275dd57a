import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

// JSON has no -0
const numberSchema = z.number().finite().transform(n => (n === 0 ? 0 : n));

const primitiveSchema = z.union([z.string(), numberSchema, z.boolean(), z.null()]);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([primitiveSchema, z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

/**
 * conversation and steps hold either an ordered list or a string-keyed mapping
 */
export type StructuredValue = JsonValue[] | { [key: string]: JsonValue };

export const StructuredValueSchema: z.ZodType<StructuredValue> = z.union([
  z.array(JsonValueSchema),
  z.record(JsonValueSchema),
]);

const nonBlank = (field: string) =>
  z.string({ required_error: `${field} is required` })
    .refine(s => s.trim().length > 0, { message: `${field} must be a non-empty string` });

export const TaskIdSchema = nonBlank('task_id');

export const CreateTaskInputSchema = z.object({
  task_id: TaskIdSchema,
  summary: nonBlank('summary'),
  conversation: StructuredValueSchema.default([]),
  details: z.string().default(''),
  steps: StructuredValueSchema.default([]),
});

export type CreateTaskInput = z.input<typeof CreateTaskInputSchema>;

export const UpdateTaskPatchSchema = z.object({
  summary: z.string().optional(),
  conversation: StructuredValueSchema.optional(),
  details: z.string().optional(),
  steps: StructuredValueSchema.optional(),
});

export type UpdateTaskPatch = z.input<typeof UpdateTaskPatchSchema>;

export type Task = {
  internal_id: number;
  task_id: string;
  summary: string;
  conversation: StructuredValue;
  details: string;
  steps: StructuredValue;
  current_step_num: number;
  is_active: boolean;
  is_waiting: boolean;
};

export type WriteResult = { changes: number };
