import { z } from 'zod';

export const RemovePhoneCommandSchema = z
  .array(z.string())
  .min(2)
  .transform(([name, phone]) => ({ name, phone }));

export type RemovePhoneCommand = z.infer<typeof RemovePhoneCommandSchema>;

export function removePhoneCommand(args: readonly string[]): RemovePhoneCommand {
  return RemovePhoneCommandSchema.parse(args);
}
