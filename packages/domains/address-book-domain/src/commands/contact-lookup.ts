import { z } from 'zod';

/** Arguments of every command that only names a contact. */
export const ContactLookupCommandSchema = z
  .array(z.string())
  .min(1)
  .transform(([name]) => ({ name }));

export type ContactLookupCommand = z.infer<typeof ContactLookupCommandSchema>;

export function contactLookupCommand(
  args: readonly string[],
): ContactLookupCommand {
  return ContactLookupCommandSchema.parse(args);
}
