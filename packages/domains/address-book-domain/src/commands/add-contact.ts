import { z } from 'zod';

export const AddContactCommandSchema = z
  .array(z.string())
  .min(1)
  .transform((args) => ({
    name: args[0],
    phone: args.length > 1 ? args[1] : null,
  }));

export type AddContactCommand = z.infer<typeof AddContactCommandSchema>;

export function addContactCommand(args: readonly string[]): AddContactCommand {
  return AddContactCommandSchema.parse(args);
}
