import { z } from 'zod';

export const FACTS_FILE_VERSION = 1;

/** On-disk shape of the persistent fact file. */
export const FactsFileSchema = z.object({
  version: z.literal(FACTS_FILE_VERSION),
  facts: z.array(z.string()),
});

export type FactsFileType = z.infer<typeof FactsFileSchema>;

export function parse_facts_file(input: unknown) {
  return FactsFileSchema.safeParse(input);
}
