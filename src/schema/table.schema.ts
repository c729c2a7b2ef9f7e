import { z } from 'zod';

export const RollTargetSchema = z.union([
  z.object({ kind: z.literal('value'), value: z.number().int() }),
  z.object({ kind: z.literal('range'), min: z.number().int(), max: z.number().int() }),
]);

export const TableRowSchema = z
  .object({
    target: RollTargetSchema,
    text: z.string(),
  })
  .superRefine((row, ctx) => {
    if (row.target.kind === 'range' && row.target.min > row.target.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['target'],
        message: `range ${row.target.min}-${row.target.max} has min greater than max`,
      });
    }
  });

export const TableRowsSchema = z.array(TableRowSchema).min(1, 'a table needs at least one row');

export type TableRowType = z.infer<typeof TableRowSchema>;

export function parse_table_rows(input: unknown) {
  return TableRowsSchema.safeParse(input);
}
